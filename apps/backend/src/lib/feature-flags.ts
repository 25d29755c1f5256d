/**
 * Feature Flag System
 * Controls agent lifecycle behaviour that is off by default
 */

export interface FeatureFlags {
  // Create the knowledge agent when a search or status probe finds it missing
  autoCreateAgent: boolean;
}

const DEFAULT_FLAGS: FeatureFlags = {
  autoCreateAgent: false,
};

function getEnvFlags(source: NodeJS.ProcessEnv): Partial<FeatureFlags> {
  const flags: Partial<FeatureFlags> = {};

  if (source.FF_AUTO_CREATE_AGENT !== undefined) {
    flags.autoCreateAgent = source.FF_AUTO_CREATE_AGENT === 'true';
  }

  return flags;
}

/**
 * Priority: Environment vars > Defaults
 */
export function getFeatureFlags(source: NodeJS.ProcessEnv = process.env): FeatureFlags {
  return { ...DEFAULT_FLAGS, ...getEnvFlags(source) };
}
