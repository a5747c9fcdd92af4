export { describeScore, type ScoreBand, type ScoreBandLevel } from './score-band';
