import type { BatchEntry, BatchOptions } from '../types.js';

/** iRODS 4.1.x only builds on its own image. */
export function selectImage(entry: BatchEntry, options: BatchOptions): string {
  if (entry.name === 'irods' && entry.version.startsWith('4.1.')) {
    return options.irodsBuildImage;
  }
  return options.condaBuildImage;
}

/**
 * The /bin/sh script run inside the container for one recipe.
 */
export function condaBuildScript(recipePath: string, options: BatchOptions): string {
  let script = `export CONDA_BLD_PATH="${options.artefactsMount}" ; `;
  script += 'conda config --set auto_update_conda False ; ';

  for (const channel of options.buildChannels) {
    script += `conda config --add channels ${channel} ; `;
  }

  script += `cd "${options.recipesMount}" && conda build ${recipePath}`;
  return script;
}

/**
 * Full `docker run` argv for one recipe. Recipes and artefacts are bind
 * mounts; the container user is mapped through CONDA_USER_ID/CONDA_GROUP_ID.
 */
export function dockerRunCommand(entry: BatchEntry, image: string, options: BatchOptions): string[] {
  const mountArgs = [
    '--mount', `source=${options.recipesDir},target=${options.recipesMount},type=bind`,
    '--mount', `source=${options.artefactsDir},target=${options.artefactsMount},type=bind`,
  ];
  const envArgs = [
    '-e', `CONDA_USER_ID=${options.condaUid}`,
    '-e', `CONDA_GROUP_ID=${options.condaGid}`,
  ];
  const otherArgs = ['-i'];
  if (options.removeContainer) otherArgs.push('--rm');

  return [
    'docker', 'run',
    ...mountArgs,
    ...envArgs,
    ...otherArgs,
    image,
    '/bin/sh', '-c', condaBuildScript(entry.path, options),
  ];
}

export function dockerPullCommand(image: string): string[] {
  return ['docker', 'pull', image];
}
