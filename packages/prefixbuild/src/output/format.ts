// Raw ANSI codes, no chalk

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';

const useColor = !process.env.NO_COLOR;

function paint(code: string, s: string): string {
  return useColor ? `${code}${s}${RESET}` : s;
}

export function bold(s: string): string { return paint(BOLD, s); }
export function dim(s: string): string { return paint(DIM, s); }
export function red(s: string): string { return paint(RED, s); }
export function green(s: string): string { return paint(GREEN, s); }
export function yellow(s: string): string { return paint(YELLOW, s); }
export function blue(s: string): string { return paint(BLUE, s); }
export function cyan(s: string): string { return paint(CYAN, s); }

export function statusColor(status: string): string {
  switch (status) {
    case 'succeeded': return green(status);
    case 'failed': return red(status);
    case 'running': return blue(status);
    default: return yellow(status);
  }
}

export function exitCodeColor(code: number | null): string {
  if (code === null) return dim('—');
  return code === 0 ? green(String(code)) : red(String(code));
}

// ── Levels ───────────────────────────────────────────────────

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: LogLevel[] = ['error', 'warn', 'info', 'debug'];

let _level: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  _level = level;
}

export function getLogLevel(): LogLevel {
  return _level;
}

export function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(_level);
}

/**
 * Pick the level from CLI flags: --debug wins, then --verbose (or a dry run),
 * then the command's own default.
 */
export function levelFromFlags(
  flags: { debug?: boolean; verbose?: boolean; dryRun?: boolean },
  fallback: LogLevel,
): LogLevel {
  if (flags.debug) return 'debug';
  if (flags.verbose || flags.dryRun) return 'info';
  return fallback;
}

/**
 * Format data as a simple table with column headers.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => stripAnsi(r[i] ?? '').length))
  );

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  const separator = widths.map(w => '─'.repeat(w)).join('──');
  const bodyLines = rows.map(row =>
    row.map((cell, i) => {
      const stripped = stripAnsi(cell);
      const padding = widths[i] - stripped.length;
      return cell + ' '.repeat(Math.max(0, padding));
    }).join('  ')
  );

  return [bold(headerLine), separator, ...bodyLines].join('\n');
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  if (!isEnabled('info')) return;
  console.log(`\n${bold(`[prefixbuild] ${title}`)}\n`);
}

/**
 * Print an error. Always shown, always on stderr.
 */
export function error(msg: string): void {
  console.error(`${red('[prefixbuild]')} ${msg}`);
}

/**
 * Print a warning.
 */
export function warn(msg: string): void {
  if (!isEnabled('warn')) return;
  console.log(`${yellow('[prefixbuild]')} ${msg}`);
}

/**
 * Print an info message.
 */
export function info(msg: string): void {
  if (!isEnabled('info')) return;
  console.log(`${cyan('[prefixbuild]')} ${msg}`);
}

/**
 * Print a success message.
 */
export function success(msg: string): void {
  if (!isEnabled('info')) return;
  console.log(`${green('[prefixbuild]')} ${msg}`);
}

export function debug(msg: string): void {
  if (!isEnabled('debug')) return;
  console.log(`${dim('[prefixbuild]')} ${msg}`);
}
