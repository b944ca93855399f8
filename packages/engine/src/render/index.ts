export { NunjucksRenderer, DEFAULT_SHELL_FILTER_TIMEOUT } from './renderer.js';
export type { Renderer, NunjucksRendererOptions } from './renderer.js';
