export {
  autotoolsPhases,
  DEFAULT_RECIPE,
  type AutotoolsOptions,
  type PhaseTemplate,
} from './autotools.js';
export {
  DEFAULT_CONFIG,
  configTemplate,
  type ConfigTemplateAnswers,
} from './config.js';
export { mkdirSafe } from './utils.js';
export {
  validateBuildEnvironment,
  formatValidation,
  hasFailures,
  type ValidationCheck,
} from './validation.js';
