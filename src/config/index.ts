import { loadEnvironment } from '@/config/environment';
import { buildCompileConfig, buildDeviceNetworkConfig, buildPlaybackConfig } from '@/config/device';

/**
 * Aggregates all configuration builders into a single bootstrap helper.
 */
export const loadConfig = () => {
  const env = loadEnvironment();
  return {
    env,
    network: buildDeviceNetworkConfig(env),
    playback: buildPlaybackConfig(),
    compile: buildCompileConfig(),
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;
