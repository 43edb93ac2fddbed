/**
 * Prompt template formatting
 */

export interface PromptFields {
  /** Index the next history entry will get */
  nextcmd: number;
  /** Current working directory */
  cwd: string;
}

/**
 * Fill `{nextcmd}` and `{cwd}` in a prompt template
 * Unknown `{...}` fields are kept as written
 */
export function formatPrompt(template: string, fields: PromptFields): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    if (name === 'nextcmd') return String(fields.nextcmd);
    if (name === 'cwd') return fields.cwd;
    return match;
  });
}
