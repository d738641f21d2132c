import type { AddonResponse } from "../domain/router.js";

export interface PlayCommandOutput {
  ident: string;
  url: string;
}

export function presentPlayResponse(
  response: Extract<AddonResponse, { action: "play" }>,
): PlayCommandOutput {
  return {
    ident: response.stream.ident,
    url: response.stream.url,
  };
}

export function renderPlayOutput(output: PlayCommandOutput): string {
  return output.url;
}
