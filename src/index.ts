export { SourceCloner, defaultDependencies } from './source-cloner';
export type { ClonerDependencies } from './source-cloner';
export { default } from './source-cloner';
export { createProgram, runCli } from './cli';
export { ColconBuilder, colconBuildArguments } from './builder';
export { VcsImporter } from './importer';
export type { RepositoryImporter } from './importer';
export { resolveManifestUrl, createManifestProbe, confirmManifest, isPathSafeReleaseTag } from './manifest';
export { validateDistribution, isSupportedDistribution } from './distribution';
export { prepareWorkspace, resolveWorkspace, wipeDirectory, cleanBuildArtifacts, cleanSources } from './workspace';
export { countPackages } from './summary';
export { buildConfiguration } from './options';
export * from './errors';
export * from './types';
export * from './constants';
