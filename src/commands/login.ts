import type { AddonResponse } from "../domain/router.js";

export interface LoginCommandOutput {
  loggedIn: boolean;
  token?: string;
}

export function presentSessionResponse(
  response: Extract<AddonResponse, { action: "login" | "logout" }>,
): LoginCommandOutput {
  if (response.action === "login") {
    return { loggedIn: true, token: response.token };
  }

  return { loggedIn: false };
}

export function renderLoginOutput(output: LoginCommandOutput): string {
  if (!output.loggedIn) {
    return "Logged out.";
  }

  return [
    "Logged in to Webshare.",
    `Token: ${output.token ?? "-"}`,
    "Store it as WEBSHARE_TOKEN (or webshare.token) to reuse the session.",
  ].join("\n");
}
