import type { MetadataSourceDescriptor } from "../domain/types.js";

export interface ProvidersCommandOutput {
  total: number;
  providers: Array<MetadataSourceDescriptor & { priority: number }>;
}

export function runProvidersCommand(
  descriptors: MetadataSourceDescriptor[],
): ProvidersCommandOutput {
  return {
    total: descriptors.length,
    providers: descriptors.map((descriptor, index) => ({ ...descriptor, priority: index + 1 })),
  };
}

export function renderProvidersOutput(output: ProvidersCommandOutput): string {
  if (output.providers.length === 0) {
    return "No metadata providers enabled.";
  }

  return [
    `Metadata providers: ${output.total}`,
    ...output.providers.map(
      (provider) =>
        `${provider.priority}. ${provider.id} | ${provider.name} | ${provider.kind} | ${renderCapabilities(provider.capabilities)}`,
    ),
  ].join("\n");
}

function renderCapabilities(capabilities: MetadataSourceDescriptor["capabilities"]): string {
  return (["genres", "series", "discovery", "doctor"] as const)
    .map((name) => `${name}:${capabilities[name] ? "yes" : "no"}`)
    .join(" ");
}
