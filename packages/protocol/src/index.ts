export * from './constants.js';
export * from './types/render.js';
export * from './types/console-attributes.js';
export * from './types/capture.js';
