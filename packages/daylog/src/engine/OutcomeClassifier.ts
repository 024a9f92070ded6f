/**
 * OutcomeClassifier: Maps page text to a verdict via marker strings.
 *
 * The target site exposes no machine-readable status, so login and
 * submission results are read off the page. Positive markers win over
 * negative ones when both appear.
 */

import type { MarkerSet } from './types';

export type Verdict = 'positive' | 'negative' | 'none';

export interface Classification {
  verdict: Verdict;
  /** The marker that decided the verdict, if any. */
  marker?: string;
}

export interface OutcomeClassifier {
  classify(text: string): Classification;
}

export function createMarkerClassifier(markers: MarkerSet): OutcomeClassifier {
  const positive = [...markers.positive];
  const negative = [...markers.negative];

  return {
    classify(text: string): Classification {
      const hit = positive.find((m) => text.includes(m));
      if (hit) return { verdict: 'positive', marker: hit };

      const miss = negative.find((m) => text.includes(m));
      if (miss) return { verdict: 'negative', marker: miss };

      return { verdict: 'none' };
    },
  };
}

/** True when any marker occurs in the text. */
export function containsAny(text: string, markers: readonly string[]): boolean {
  return markers.some((m) => text.includes(m));
}
