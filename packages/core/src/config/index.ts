/**
 * Config module exports.
 */

export {
	type PreloadConfig,
	type RawPreloadConfigKey,
	DEFAULT_CAPACITY,
	DEFAULT_BATCH_WIDTH,
	DEFAULT_LOAD_TIMEOUT,
	MAX_LOAD_TIMEOUT,
	resolvePreloadConfig,
	parsePreloadConfigContent,
	findPreloadConfigFile,
	readPreloadConfig,
} from "./config.js";
