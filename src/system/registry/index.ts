export { createRegistry } from './registry';
export type { Registry, RegistryDeps } from './types';
