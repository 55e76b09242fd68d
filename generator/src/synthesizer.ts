import type { Clock, CommitDate, CommitSchedule, Configuration, RandomSource } from "./types.js";
import { addMinutes, eveningAnchor, isWeekend } from "./dates.js";

const MIN_COMMITS_PER_DAY = 1;
const MAX_COMMITS_PER_DAY = 20;

export interface SynthesizerDeps {
  random: RandomSource;
  clock: Clock;
}

export function clampMaxCommits(maxCommits: number): number {
  return Math.max(MIN_COMMITS_PER_DAY, Math.min(MAX_COMMITS_PER_DAY, maxCommits));
}

function contributionsPerDay(config: Configuration, random: RandomSource): number {
  return random.randint(1, clampMaxCommits(config.maxCommits));
}

/**
 * Builds the commit schedule for the window
 * [today - daysBefore, today + daysAfter), one 20:00 anchor per day.
 *
 * The per-day count is drawn twice: first an upper bound from
 * [1, clamp(maxCommits)], then the count itself from [1, bound].
 * Both draws happen for every included day, in that order.
 */
export function synthesizeCommitDates(
  config: Configuration,
  { random, clock }: SynthesizerDeps
): CommitSchedule {
  const now = clock();
  const totalDays = config.daysBefore + config.daysAfter;
  const schedule: CommitDate[] = [];

  for (let n = 0; n < totalDays; n++) {
    const day = eveningAnchor(now, n - config.daysBefore);

    if (config.noWeekends && isWeekend(day)) continue;
    if (random.randint(0, 100) >= config.frequency) continue;

    const bound = contributionsPerDay(config, random);
    const count = random.randint(1, bound);
    for (let minute = 0; minute < count; minute++) {
      schedule.push(addMinutes(day, minute));
    }
  }

  return schedule;
}
