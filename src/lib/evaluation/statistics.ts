/**
 * Aggregate statistics over paired judge scores
 */
import { AggregationError } from '../errors';

export interface AggregateStatistics {
  meanOptimizedScore: number;
  meanBaselineScore: number;
  absoluteImprovement: number;
  /** Relative to the baseline mean; 0 when the baseline mean is 0 */
  percentImprovement: number;
  /** Paired t statistic; NaN when undefined */
  pairedTestStatistic: number;
  /** Two-sided p-value; NaN when undefined */
  pValue: number;
  isSignificant: boolean;
  sampleSize: number;
}

export const SIGNIFICANCE_LEVEL = 0.05;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample variance (n - 1 denominator)
 */
export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  return values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
}

/* ------------------------------------------------------------------ */
/* Student's t distribution                                           */
/* ------------------------------------------------------------------ */

const LANCZOS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
];

/**
 * Natural log of the gamma function (Lanczos approximation, g = 7)
 */
export function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(1 - x);
  }
  const z = x - 1;
  let a = LANCZOS[0];
  const t = z + 7.5;
  for (let i = 1; i < LANCZOS.length; i++) {
    a += LANCZOS[i] / (z + i);
  }
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

// Continued fraction for the incomplete beta function (modified Lentz)
function betaContinuedFraction(a: number, b: number, x: number): number {
  const MAX_ITERATIONS = 200;
  const EPSILON = 3e-14;
  const TINY = 1e-300;

  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < TINY) d = TINY;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= MAX_ITERATIONS; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < TINY) d = TINY;
    c = 1 + aa / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < TINY) d = TINY;
    c = 1 + aa / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < EPSILON) break;
  }
  return h;
}

/**
 * Regularised incomplete beta function I_x(a, b)
 */
export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x)
  );

  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

/**
 * Two-sided p-value of a t statistic with `df` degrees of freedom
 */
export function studentTTwoSidedPValue(t: number, df: number): number {
  if (Number.isNaN(t) || df <= 0) return NaN;
  if (!Number.isFinite(t)) return 0;
  return regularizedIncompleteBeta(df / (df + t * t), df / 2, 0.5);
}

/**
 * Paired t-test on `optimized[i] - baseline[i]`
 */
export function pairedTTest(optimized: readonly number[], baseline: readonly number[]): { t: number; pValue: number } {
  const n = optimized.length;
  if (n < 2) return { t: NaN, pValue: NaN };

  const differences = optimized.map((value, i) => value - baseline[i]);
  const meanDiff = mean(differences);
  const variance = sampleVariance(differences);

  if (variance === 0) {
    if (meanDiff === 0) return { t: NaN, pValue: NaN };
    return { t: meanDiff > 0 ? Infinity : -Infinity, pValue: 0 };
  }

  const t = meanDiff / Math.sqrt(variance / n);
  return { t, pValue: studentTTwoSidedPValue(t, n - 1) };
}

/**
 * Compare optimised and baseline scores measured on the same queries
 *
 * @throws AggregationError when the sequences are not the same length
 */
export function calculateStatistics(optimized: readonly number[], baseline: readonly number[]): AggregateStatistics {
  if (optimized.length !== baseline.length) {
    throw new AggregationError(
      `Cannot pair ${optimized.length} optimized scores with ${baseline.length} baseline scores`
    );
  }

  const meanOptimizedScore = mean(optimized);
  const meanBaselineScore = mean(baseline);
  const absoluteImprovement = meanOptimizedScore - meanBaselineScore;
  const percentImprovement = meanBaselineScore > 0 ? (absoluteImprovement / meanBaselineScore) * 100 : 0;
  const { t, pValue } = pairedTTest(optimized, baseline);

  return {
    meanOptimizedScore,
    meanBaselineScore,
    absoluteImprovement,
    percentImprovement,
    pairedTestStatistic: t,
    pValue,
    isSignificant: pValue < SIGNIFICANCE_LEVEL,
    sampleSize: optimized.length,
  };
}
