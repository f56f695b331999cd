import { SUPPORTED_DISTRIBUTIONS } from './constants';

export type Distribution = (typeof SUPPORTED_DISTRIBUTIONS)[number];

export interface Configuration {
  distribution: string;
  releaseTag?: string;
  targetDirectory: string;
  cleanBeforeClone: boolean;
}

export interface ResolvedManifestReference {
  url: string;
  confirmed: boolean;
}

/** A manifest reference whose URL answered the existence probe. */
export interface ConfirmedManifest extends ResolvedManifestReference {
  confirmed: true;
}

export interface WorkspaceLayout {
  root: string;
  sourceDir: string;
}

export interface CloneOutcome {
  distribution: Distribution;
  releaseTag?: string;
  manifest: ConfirmedManifest;
  workspace: WorkspaceLayout;
  packageCount: number | null;
}

export interface BuildRequest {
  workspace: string;
  buildType?: string;
  cmakeOptions: string[];
}

export type PipelineStage =
  | 'start'
  | 'args-parsed'
  | 'prereqs-checked'
  | 'distro-validated'
  | 'url-resolved'
  | 'url-confirmed'
  | 'workspace-prepared'
  | 'cloned'
  | 'summarized'
  | 'done'
  | 'failed';

export interface RequiredTool {
  command: string;
  displayName: string;
  installHint?: string;
}
