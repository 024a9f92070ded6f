import { z } from 'zod';
import { CandidateListSchema, MarkerSetSchema } from '../engine/types';

// ── SiteProfile ──────────────────────────────────────────────────────────
// Everything daylog knows about one deployment of the journal site: where
// each field may live (ordered fallbacks), which text means what, and
// which paths lead to the entry form.

export const LoginProfileSchema = z.object({
  accountField: CandidateListSchema,
  secretField: CandidateListSchema,
  submit: CandidateListSchema,
  /** Text that only appears once logged in. The account id is added per run. */
  markers: MarkerSetSchema,
});

export const NavigationProfileSchema = z.object({
  featureLinks: CandidateListSchema,
  /** Substrings of the entry form's URL. */
  urlMarkers: z.array(z.string().min(1)),
  /** Substrings of the entry form's markup. */
  sourceMarkers: z.array(z.string().min(1)).min(1),
  /** Path segment that marks the application root, e.g. "/punch/". */
  rootSegment: z.string().min(1),
  /** Appended to the site origin root when visiting the form directly. */
  pathSuffixes: z.array(z.string().min(1)),
  /** How many link texts to log before waiting for manual help. */
  linkSampleSize: z.number().int().nonnegative().default(10),
});

export const EntryProfileSchema = z.object({
  dateField: CandidateListSchema,
  contentField: CandidateListSchema,
  categoryField: CandidateListSchema,
  submit: CandidateListSchema,
  markers: MarkerSetSchema,
});

export const SiteProfileSchema = z.object({
  name: z.string().min(1),
  login: LoginProfileSchema,
  navigation: NavigationProfileSchema,
  entry: EntryProfileSchema,
});

export type LoginProfile = z.infer<typeof LoginProfileSchema>;
export type NavigationProfile = z.infer<typeof NavigationProfileSchema>;
export type EntryProfile = z.infer<typeof EntryProfileSchema>;
export type SiteProfile = z.infer<typeof SiteProfileSchema>;

/** Section-level override: any field of any section may be replaced. */
export const SiteProfileOverrideSchema = z.object({
  name: z.string().min(1).optional(),
  login: LoginProfileSchema.partial().optional(),
  navigation: NavigationProfileSchema.partial().optional(),
  entry: EntryProfileSchema.partial().optional(),
});

export type SiteProfileOverride = z.infer<typeof SiteProfileOverrideSchema>;
