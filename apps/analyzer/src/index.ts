import { runCli } from "./cli";

process.on("SIGINT", () => {
  // eslint-disable-next-line no-console
  console.warn(JSON.stringify({ level: "warn", message: "run.interrupted" }));
  process.exit(130);
});

void runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
