export {
  loadAndValidate,
  loadModule,
  loaderOptionsFromConfig,
  lookupName,
  modulePath,
} from './loader.js';
export type { LoaderOptions, ReadFile } from './loader.js';
