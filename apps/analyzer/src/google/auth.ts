import { type Auth, google } from "googleapis";

export const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/drive.readonly",
  "https://www.googleapis.com/auth/spreadsheets",
];

/** Service-account auth read from a JSON key file. */
export function createGoogleAuth(keyFile: string): Auth.GoogleAuth {
  return new google.auth.GoogleAuth({ keyFile, scopes: GOOGLE_SCOPES });
}
