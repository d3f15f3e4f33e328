/**
 * Interactive sandbox credentials.
 */

import { ApiError, type RawOsmBody } from "@sandbox-mirror/clients-core";
import type { Prompt } from "./prompt.js";

/** What the credential probe needs from an API client */
export interface AuthTarget {
  setAuthorization(authorization: string | undefined): void;
  getUserDetails(): Promise<RawOsmBody>;
}

export function basicAuthHeader(login: string, password: string): string {
  return `Basic ${Buffer.from(`${login}:${password}`, "utf8").toString("base64")}`;
}

/**
 * Ask for a login and password until `GET user/details` accepts them.
 *
 * The accepted header is left set on `api`.
 *
 * @returns The Authorization header, or null when the login is left empty
 */
export async function readAuth(prompt: Prompt, api: AuthTarget): Promise<string | null> {
  for (;;) {
    const login = (await prompt.ask("Login: ")).trim();
    if (!login) return null;

    const header = basicAuthHeader(login, await prompt.askSecret("Password: "));
    api.setAuthorization(header);
    try {
      const details = await api.getUserDetails();
      if ((details.user?.length ?? 0) > 0) return header;
    } catch (err) {
      if (!(err instanceof ApiError)) throw err;
    }
    api.setAuthorization(undefined);
    console.log("You must have mistyped. Please try again.");
  }
}
