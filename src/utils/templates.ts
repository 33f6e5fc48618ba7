// {{VARIABLE_NAME}} gets replaced with the string value.

import * as fs from "node:fs";
import * as path from "node:path";

export function applyTemplateVariables(template: string, variables: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(variables)) {
    output = output.split(`{{${key}}}`).join(value);
  }
  return output;
}

// does not check for existence
export function getPathRelativeToTemplates(more: string): string {
  return path.resolve(__dirname, "..", "..", "templates", more);
}

export function loadTemplate(relativePath: string): string {
  const templatePath = getPathRelativeToTemplates(relativePath);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Template not found: ${templatePath}`);
  }
  return fs.readFileSync(templatePath, "utf-8");
}
