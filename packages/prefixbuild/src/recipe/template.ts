import { RecipeError } from '../errors.js';

export type TemplateVars = Record<string, string>;

const PATTERN = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Substitute `${VAR}` from vars. `$$` is a literal `$`.
 * An unknown variable is an error, never an empty string.
 */
export function expandTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PATTERN, (_match: string, name: string | undefined) => {
    if (name === undefined) return '$';
    const value = vars[name];
    if (value === undefined) {
      throw new RecipeError(`Unknown variable \${${name}} in "${template}"`);
    }
    return value;
  });
}

/**
 * Render a command line for display. Arguments with shell-special
 * characters are single-quoted.
 */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}

function quoteArg(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_\-+=.,/:@%]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
