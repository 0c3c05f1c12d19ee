export function stripExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
