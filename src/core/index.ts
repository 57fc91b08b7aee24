/**
 * Core entrypoint: the client, its configuration and the default client registry.
 * @module
 */

export { type ClientOptions, type Configuration, loadConfiguration } from '../config/configuration.js';
export { Client } from './client.js';
export { getDefaultClient, initDefaultClient, resetDefaultClient } from './registry.js';
