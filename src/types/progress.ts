/**
 * Progress tracking for long-running waits
 */

export interface ProgressTracker {
  /**
   * Run a task while showing progress; the returned promise settles with the task
   */
  track<T>(text: string, task: () => Promise<T>, successText?: string): Promise<T>;
}

/**
 * Tracker that shows nothing
 */
export const silentProgress: ProgressTracker = {
  track: (_text, task) => task(),
};
