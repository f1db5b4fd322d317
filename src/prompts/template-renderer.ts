/**
 * Template rendering utility for prompts.
 * Supports Mustache-style variable interpolation: {{variableName}}
 */

export type TemplateVariables = Record<string, string | number>;

const TEMPLATE_PATTERN = /\{\{(\s*[\w.]+\s*)\}\}/g;

/**
 * Renders a template string by replacing {{variableName}} placeholders with values.
 * Values are inserted as-is; placeholders inside a value are not expanded.
 *
 * @throws Error if a variable is referenced but not provided
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(TEMPLATE_PATTERN, (_match: string, variableName: string) => {
    const trimmedName = variableName.trim();
    const value = variables[trimmedName];

    if (value === undefined) {
      throw new Error(
        `Template variable '${trimmedName}' is not defined. Available variables: ${Object.keys(
          variables
        ).join(', ')}`
      );
    }

    return String(value);
  });
}
