export const DEFAULT_STYLE = "conventional commit";

const STYLE_ALIASES = new Map<string, string>([
  ["conv", "conventional commit"],
  ["plain", "plain imperative"],
  ["gitmoji", "gitmoji"],
]);

/**
 * Expands the short style names (`conv`, `plain`, `gitmoji`); any other
 * label is passed through as written.
 */
export function resolveStyle(style: string): string {
  const label = style.trim();
  if (!label) return DEFAULT_STYLE;
  return STYLE_ALIASES.get(label.toLowerCase()) ?? label;
}

export function buildPrompt(description: string, style: string): string {
  return `You are an expert programmer writing a git commit message.
Your task is to generate a single, git commit message in the '${style}' style for the following change description.

VERY IMPORTANT: Your entire response must be only the commit message itself. Do not include any surrounding text, explanations, apologies, or markdown formatting like \`\`\`.

Change Description: "${description}"`;
}
