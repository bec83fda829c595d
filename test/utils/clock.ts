/**
 * Pin `new Date()` and `Date.now()` to one instant. Timers stay real so
 * retry delays and the event channel keep running.
 */
export function pinClock(now: Date): void {
  jest.useFakeTimers({
    now,
    doNotFake: [
      'hrtime',
      'nextTick',
      'performance',
      'queueMicrotask',
      'setImmediate',
      'clearImmediate',
      'setInterval',
      'clearInterval',
      'setTimeout',
      'clearTimeout',
    ],
  });
}
