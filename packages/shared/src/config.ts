export interface ConfigTemplateAnswers {
  recipesDir?: string;
  recordHistory?: boolean;
  buildChannels?: string[];
}

export const DEFAULT_CONFIG = {
  recipes: {
    dir: 'recipes',
  },
  build: {
    record_history: true,
  },
  docker: {
    recipes_dir: '$HOME/conda-recipes',
    recipes_mount: '/home/conda/recipes',
    artefacts_dir: '$HOME/conda-artefacts',
    artefacts_mount: '/opt/conda/conda-bld',
    build_image: 'wsinpg/ub-12.04-conda:latest',
    irods_build_image: 'wsinpg/ub-12.04-conda-irods:latest',
    build_channels: [] as string[],
    remove_container: false,
  },
};

export function configTemplate(answers: ConfigTemplateAnswers = {}): string {
  return JSON.stringify({
    recipes: {
      dir: answers.recipesDir || DEFAULT_CONFIG.recipes.dir,
    },
    build: {
      record_history: answers.recordHistory ?? DEFAULT_CONFIG.build.record_history,
    },
    docker: {
      ...DEFAULT_CONFIG.docker,
      build_channels: answers.buildChannels ?? [],
    },
  }, null, 2);
}
