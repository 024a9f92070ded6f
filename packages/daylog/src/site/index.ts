export {
  SiteProfileSchema,
  SiteProfileOverrideSchema,
  LoginProfileSchema,
  NavigationProfileSchema,
  EntryProfileSchema,
  type SiteProfile,
  type SiteProfileOverride,
  type LoginProfile,
  type NavigationProfile,
  type EntryProfile,
} from './types';
export { DEFAULT_PROFILE } from './defaultProfile';
export { loadSiteProfile, mergeProfile } from './loadProfile';
