/**
 * Normal-approximation statistics used by regression detection and
 * quality reporting.
 */

/**
 * Error function, Abramowitz & Stegun 7.1.26 (max error 1.5e-7).
 */
export function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const y = 1 - (((((1.061405429 * t - 1.453152027) * t) + 1.421413741) * t - 0.284496736) * t + 0.254829592) * t * Math.exp(-ax * ax);
  return sign * y;
}

export function normalCdf(z: number): number {
  return 0.5 * (1 + erf(z / Math.SQRT2));
}

/**
 * Inverse standard normal CDF (Acklam's rational approximation).
 */
export function normalQuantile(p: number): number {
  if (p <= 0 || p >= 1) {
    throw new RangeError(`Quantile probability must be in (0, 1), got ${p}`);
  }

  const a = [-3.969683028665376e+01, 2.209460984245205e+02, -2.759285104469687e+02, 1.383577518672690e+02, -3.066479806614716e+01, 2.506628277459239e+00];
  const b = [-5.447609879822406e+01, 1.615858368580409e+02, -1.556989798598866e+02, 6.680131188771972e+01, -1.328068155288572e+01];
  const c = [-7.784894002430293e-03, -3.223964580411365e-01, -2.400758277161838e+00, -2.549732539343734e+00, 4.374664141464968e+00, 2.938163982698783e+00];
  const d = [7.784695709041462e-03, 3.224671290700398e-01, 2.445134137142996e+00, 3.754408661907416e+00];

  const pLow = 0.02425;
  const pHigh = 1 - pLow;

  if (p < pLow) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
  }
  if (p > pHigh) {
    const q = Math.sqrt(-2 * Math.log(1 - p));
    return -(((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1);
  }

  const q = p - 0.5;
  const r = q * q;
  return (((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q /
    (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1);
}

export interface ProportionTestResult {
  /** baseline rate minus recent rate */
  drop: number;
  z: number;
  /** one-sided p-value for "recent is lower than baseline" */
  pValue: number;
  /** unpooled standard error of the difference */
  standardError: number;
}

/**
 * One-sided two-proportion z-test (pooled variance for the statistic,
 * unpooled for the confidence bound on the difference).
 */
export function twoProportionTest(
  baselineRate: number,
  baselineN: number,
  recentRate: number,
  recentN: number
): ProportionTestResult {
  const drop = baselineRate - recentRate;
  const pooled = (baselineRate * baselineN + recentRate * recentN) / (baselineN + recentN);
  const pooledSe = Math.sqrt(pooled * (1 - pooled) * (1 / baselineN + 1 / recentN));
  const standardError = Math.sqrt(
    (baselineRate * (1 - baselineRate)) / baselineN + (recentRate * (1 - recentRate)) / recentN
  );

  if (pooledSe === 0) {
    return { drop, z: 0, pValue: 1, standardError };
  }

  const z = drop / pooledSe;
  return { drop, z, pValue: 1 - normalCdf(z), standardError };
}

/**
 * Wilson score interval for a binomial proportion.
 */
export function wilsonInterval(successes: number, n: number, confidence = 0.95): { lower: number; upper: number } {
  if (n === 0) return { lower: 0, upper: 1 };
  const z = normalQuantile(1 - (1 - confidence) / 2);
  const p = successes / n;
  const denominator = 1 + (z * z) / n;
  const centre = p + (z * z) / (2 * n);
  const margin = z * Math.sqrt((p * (1 - p)) / n + (z * z) / (4 * n * n));
  return {
    lower: Math.max(0, (centre - margin) / denominator),
    upper: Math.min(1, (centre + margin) / denominator),
  };
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
