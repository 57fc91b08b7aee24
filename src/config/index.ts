export {
  type ClientOptions,
  type Configuration,
  ConfigurationSchema,
  loadConfiguration,
  resolveConfiguration,
} from './configuration.js';
export { BASE_HOST, CURRENT_VERSION, DEFAULT_API_KEY_HEADER, SANDBOX_HOST } from './constants.js';
