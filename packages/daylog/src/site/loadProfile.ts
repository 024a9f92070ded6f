import fs from 'fs';
import { DEFAULT_PROFILE } from './defaultProfile';
import { SiteProfileOverrideSchema, type SiteProfile, type SiteProfileOverride } from './types';

export function mergeProfile(base: SiteProfile, override: SiteProfileOverride): SiteProfile {
  return {
    name: override.name ?? base.name,
    login: { ...base.login, ...override.login },
    navigation: { ...base.navigation, ...override.navigation },
    entry: { ...base.entry, ...override.entry },
  };
}

/**
 * Load a JSON profile override and lay it over the default profile.
 * Without a path the default profile is returned as is.
 */
export function loadSiteProfile(path?: string, base: SiteProfile = DEFAULT_PROFILE): SiteProfile {
  if (!path) return base;

  const raw = fs.readFileSync(path, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Site profile ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const override = SiteProfileOverrideSchema.parse(json);
  return mergeProfile(base, override);
}
