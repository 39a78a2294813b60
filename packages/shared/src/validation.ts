/**
 * Build environment readiness checks for prefixbuild.
 * Surfaces what's in place, what's missing, and what will go wrong
 * when a build runs without it.
 */

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

/**
 * Validate a build environment given pre-resolved facts.
 * The caller does the fs/PATH lookups so this stays pure.
 */
export function validateBuildEnvironment(checks: {
  prefix: string | undefined;
  prefixUsable: boolean;
  toolsOnPath: Record<string, boolean>;
  hasConfigureAc: boolean;
  featureHeaders: Record<string, boolean>;
  dockerOnPath: boolean;
}): ValidationCheck[] {
  const results: ValidationCheck[] = [];

  const prefix = checks.prefix?.trim();
  if (!prefix) {
    results.push({ label: 'PREFIX', status: 'fail', detail: 'Not set; configure and make install would get an empty prefix' });
  } else if (!checks.prefixUsable) {
    results.push({ label: 'PREFIX', status: 'fail', detail: `${prefix} cannot be created or written` });
  } else {
    results.push({ label: 'PREFIX', status: 'pass', detail: prefix });
  }

  for (const [tool, found] of Object.entries(checks.toolsOnPath)) {
    results.push(found
      ? { label: tool, status: 'pass', detail: 'Found on PATH' }
      : { label: tool, status: 'fail', detail: 'Not on PATH' }
    );
  }

  results.push(checks.hasConfigureAc
    ? { label: 'configure.ac', status: 'pass', detail: 'Found in source tree' }
    : { label: 'configure.ac', status: 'fail', detail: 'Missing; autoreconf has nothing to regenerate' }
  );

  for (const [feature, present] of Object.entries(checks.featureHeaders)) {
    results.push(present
      ? { label: `${feature} headers`, status: 'pass', detail: `Found under ${prefix}/include` }
      : { label: `${feature} headers`, status: 'warn', detail: `Nothing under ${prefix ?? '$PREFIX'}/include; configure --with-${feature} will likely fail` }
    );
  }

  results.push(checks.dockerOnPath
    ? { label: 'docker', status: 'pass', detail: 'Found on PATH' }
    : { label: 'docker', status: 'warn', detail: 'Not on PATH; batch builds unavailable' }
  );

  return results;
}

export function hasFailures(checks: ValidationCheck[]): boolean {
  return checks.some(c => c.status === 'fail');
}

// Own NO_COLOR gate: shared does not import the CLI's formatter.
const _useColor = !process.env.NO_COLOR && (process.stdout?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[], useColor: boolean = _useColor): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}
