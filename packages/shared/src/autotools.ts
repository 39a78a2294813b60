/**
 * The standard autotools sequence: regenerate, configure, make install.
 * Arguments are templates; `${PREFIX}` is substituted by the driver.
 */

export interface PhaseTemplate {
  name: string;
  command: string;
  args: string[];
}

export interface AutotoolsOptions {
  /** Features passed to configure as `--with-<feature>`. */
  with?: string[];
  /** Extra configure arguments, placed after the feature flags. */
  configureArgs?: string[];
  /** Add CPPFLAGS/LDFLAGS rooted at the prefix. Default: true. */
  searchPaths?: boolean;
}

export function autotoolsPhases(options: AutotoolsOptions = {}): PhaseTemplate[] {
  const features = options.with ?? [];
  const searchPaths = options.searchPaths ?? true;

  const configureArgs = ['--prefix=${PREFIX}'];
  for (const feature of features) {
    configureArgs.push(`--with-${feature}`);
  }
  configureArgs.push(...(options.configureArgs ?? []));
  if (searchPaths) {
    configureArgs.push('CPPFLAGS=-I${PREFIX}/include', 'LDFLAGS=-L${PREFIX}/lib');
  }

  return [
    { name: 'autoreconf', command: 'autoreconf', args: ['-fi'] },
    { name: 'configure', command: './configure', args: configureArgs },
    { name: 'install', command: 'make', args: ['install', 'prefix=${PREFIX}'] },
  ];
}

/** Built-in recipe used when `build` is given no name. */
export const DEFAULT_RECIPE: { name: string; version: string; autotools: AutotoolsOptions } = {
  name: 'tears',
  version: '1.2.3',
  autotools: { with: ['irods'] },
};
