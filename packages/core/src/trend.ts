export type TrendDescription = "improving" | "slowing" | "steady" | "insufficient";

const MIN_POINTS = 3;
const MIN_R_SQUARED = 0.5;
const CHANGE_PERCENT = 5;

/**
 * Predicts the next keystroke time from a linear fit over recent times.
 * Null when there are too few points, the series is flat, or the fit is poor.
 */
export function predictNextTime(times: readonly number[]): number | null {
  const n = times.length;
  if (n < MIN_POINTS) return null;

  const xMean = (n - 1) / 2;
  const yMean = times.reduce((s, t) => s + t, 0) / n;

  let ssXY = 0;
  let ssXX = 0;
  let ssYY = 0;
  times.forEach((y, x) => {
    const dx = x - xMean;
    const dy = y - yMean;
    ssXY += dx * dy;
    ssXX += dx * dx;
    ssYY += dy * dy;
  });

  if (ssXX < 1e-10 || ssYY < 1e-10) return null;

  const rSquared = (ssXY * ssXY) / (ssXX * ssYY);
  if (rSquared < MIN_R_SQUARED) return null;

  const slope = ssXY / ssXX;
  return Math.max(0, yMean + slope * (n - xMean));
}

export function describeTrend(times: readonly number[]): TrendDescription {
  const predicted = predictNextTime(times);
  if (predicted === null) return "insufficient";

  const current = times[times.length - 1];
  if (current <= 0) return "steady";
  const improvement = ((current - predicted) / current) * 100;
  if (improvement > CHANGE_PERCENT) return "improving";
  if (improvement < -CHANGE_PERCENT) return "slowing";
  return "steady";
}
