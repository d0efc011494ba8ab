export { default as registryPlugin } from './registry-plugin.js';
export type { RegistryPluginOptions } from './registry-plugin.js';
export { default as serviceRoutes } from './service-routes.js';
