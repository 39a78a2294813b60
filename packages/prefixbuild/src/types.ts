import type { PhaseTemplate } from '@prefixbuild/shared';

export interface PrefixbuildConfig {
  recipes: {
    dir: string;
  };
  build: {
    record_history: boolean;
  };
  docker: {
    recipes_dir: string;
    recipes_mount: string;
    artefacts_dir: string;
    artefacts_mount: string;
    build_image: string;
    irods_build_image: string;
    build_channels: string[];
    remove_container: boolean;
  };
}

/** A phase after template expansion, ready to spawn. */
export type Phase = PhaseTemplate;

export interface PhaseResult {
  name: string;
  commandLine: string;
  exitCode: number;
  durationMs: number;
}

export interface BuildResult {
  recipe: string;
  version: string;
  prefix: string;
  exitCode: number;
  failedPhase: string | null;   // null when every phase succeeded
  phases: PhaseResult[];
}

export type RunKind = 'local' | 'docker';
export type RunStatus = 'running' | 'succeeded' | 'failed';

export interface Run {
  id: number;
  kind: RunKind;
  recipe: string;
  version: string;
  prefix: string | null;
  source_dir: string | null;
  status: RunStatus;
  exit_code: number | null;
  started_at: string;
  finished_at: string | null;
}

export interface PhaseRun {
  id: number;
  run_id: number;
  seq: number;
  name: string;
  command_line: string;
  exit_code: number;
  duration_ms: number;
  started_at: string;
}

export interface BatchEntry {
  name: string;
  version: string;
  path: string;
  line: number;
}

export interface BatchOptions {
  recipesDir: string;
  recipesMount: string;
  artefactsDir: string;
  artefactsMount: string;
  buildChannels: string[];
  irodsBuildImage: string;
  condaBuildImage: string;
  removeContainer: boolean;
  condaUid: number;
  condaGid: number;
  dryRun: boolean;
}

export interface BatchPackageResult {
  entry: BatchEntry;
  image: string;
  exitCode: number | null;   // null on dry-run
}
