import { Cron } from 'croner';

/**
 * Check if the given time falls inside a cron-style schedule window.
 *
 * Supports cron format and the special value "at any time". The window is
 * the hour containing the schedule's next run.
 */
export function matchesSchedule(schedule: string, now: Date = new Date()): boolean {
  if (schedule === 'at any time') {
    return true;
  }

  try {
    const cron = new Cron(schedule, { legacyMode: false });

    // Start just before `now` so a run at the top of the current hour counts
    const nextRun = cron.nextRun(new Date(now.getTime() - 1000));
    if (!nextRun) {
      return true;
    }

    return (
      nextRun.getHours() === now.getHours() &&
      nextRun.getDate() === now.getDate() &&
      nextRun.getMonth() === now.getMonth()
    );
  } catch {
    // An unparseable schedule does not block the run
    return true;
  }
}
