import type { PracticeStreak } from "@keyladder/types";

export const EMPTY_STREAK: PracticeStreak = { streakDays: 0, bestStreak: 0, lastPracticeDate: null };

/** UTC calendar day of `date` as YYYY-MM-DD. */
export function practiceDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function previousDay(day: string): string {
  const date = new Date(`${day}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() - 1);
  return practiceDay(date);
}

/**
 * Counts a session practised at `now`. A second session on the same day
 * changes nothing; a day after the last one extends the streak; any gap
 * starts it over.
 */
export function recordPracticeDay(streak: PracticeStreak, now: Date): PracticeStreak {
  const today = practiceDay(now);
  if (streak.lastPracticeDate === today) return streak;

  const streakDays = streak.lastPracticeDate === previousDay(today) ? streak.streakDays + 1 : 1;
  return {
    streakDays,
    bestStreak: Math.max(streak.bestStreak, streakDays),
    lastPracticeDate: today,
  };
}
