import { applyTemplateVariables, loadTemplate } from "./templates";
import { getVersionTag, readPackageInfo } from "./versionString";

export const kHelpTopics = ["main", "compress", "decompress", "inspect"] as const;
export type HelpTopic = (typeof kHelpTopics)[number];

const kCommandAliases = new Map<string, HelpTopic>([
  ["compress", "compress"],
  ["c", "compress"],
  ["decompress", "decompress"],
  ["d", "decompress"],
  ["inspect", "inspect"],
  ["x", "inspect"],
]);

export function resolveHelpTopic(command: string): HelpTopic | undefined {
  return kCommandAliases.get(command);
}

export function renderHelp(topic: HelpTopic): string {
  const template = loadTemplate(`help/${topic}.txt`);
  return applyTemplateVariables(template, {
    VERSION: getVersionTag(readPackageInfo()),
  });
}

export function printHelp(topic: HelpTopic): void {
  console.log(renderHelp(topic));
}
