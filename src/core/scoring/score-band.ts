/**
 * Score Bands
 *
 * Maps a rubric total to the encouragement headline shown above feedback.
 * A score of 0 only comes from a rejected or failed evaluation, so it gets
 * an error band rather than an encouragement.
 */

export type ScoreBandLevel = 'excellent' | 'good' | 'developing' | 'needs_work' | 'error';

export interface ScoreBand {
  level: ScoreBandLevel;
  /** Short headline, e.g. 'Excellent!' */
  label: string;
  /** Headline with the score, e.g. 'Excellent! Total: 85 / 100' */
  summary: string;
}

const ERROR_SUMMARY = 'Something went wrong during evaluation';

export function describeScore(score: number): ScoreBand {
  let level: ScoreBandLevel;
  let label: string;

  if (score >= 80) {
    level = 'excellent';
    label = 'Excellent!';
  } else if (score >= 60) {
    level = 'good';
    label = 'Nice work!';
  } else if (score >= 40) {
    level = 'developing';
    label = 'Almost there!';
  } else if (score > 0) {
    level = 'needs_work';
    label = 'Keep going!';
  } else {
    return { level: 'error', label: 'Evaluation error', summary: ERROR_SUMMARY };
  }

  return { level, label, summary: `${label} Total: ${score} / 100` };
}
