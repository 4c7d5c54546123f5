import { resolveScoringOptions } from '../constants/scoring.js';
import { CRITICAL_THEMES } from '../constants/taxonomy.js';
import { textField } from '../errors.js';
import type { ScoringOptions, ThemeId } from '../types.js';
import { buildWeightedBlob } from '../utils/normalize.js';

export interface ThemeDetection {
  themes: ThemeId[];
  boost: number;
}

/**
 * Flag critical macro themes. A theme stops at its first matching trigger and
 * contributes one fixed boost no matter how many of its triggers appear.
 */
export function detectThemes(
  title: unknown,
  content: unknown,
  overrides?: Partial<ScoringOptions>,
): ThemeDetection {
  const opts = resolveScoringOptions(overrides);
  const blob = buildWeightedBlob(
    textField(title, 'title'),
    textField(content, 'content'),
    opts.titleWeightMultiplier,
  );

  const themes: ThemeId[] = [];
  for (const theme of CRITICAL_THEMES) {
    if (themes.includes(theme.id)) continue;
    if (theme.triggers.some((trigger) => blob.includes(trigger))) {
      themes.push(theme.id);
    }
  }

  return { themes, boost: themes.length * opts.themeBoost };
}
