/**
 * Cache module exports.
 */

export {
	type Assembler,
	type PreloadEvent,
	type PreloadCacheOptions,
	type PreloadStats,
	PreloadCache,
} from "./preload-cache.js";

export { raceWithTimeout } from "./timeout.js";
