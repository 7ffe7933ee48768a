export { ProcessDirectoryClient, type DirectoryClientOptions, type FetchLike } from './client';
export { directoryConfigFromEnv, type DirectoryEnvConfig } from './config';
export { Routes, buildRoute, type RouteName, type RoutePath } from './routes';
export type { WireProcess, WireContextProcesses } from './schema';
