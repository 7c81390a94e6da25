/**
 * Entity model and linkage exports
 */

export { NearEarthObject } from './near-earth-object.js';
export type { NeoInfo } from './near-earth-object.js';
export { CloseApproach } from './close-approach.js';
export type { CloseApproachInfo } from './close-approach.js';
export { link, indexByDesignation } from './linkage.js';
export type { LinkOptions, LinkResult } from './linkage.js';
