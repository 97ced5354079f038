/**
 * Core module index file
 */
export { initialize } from './app';
