import type { WaitClock } from '../../src/pinterest/wait_strategy';

export type FakeClock = {
  clock: WaitClock;
  sleeps: number[];
  now: () => number;
  advance: (ms: number) => void;
};

/** sleep 호출 시 즉시 시간을 전진시키는 가짜 시계 */
export function createFakeClock(start: number = 0): FakeClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    clock: {
      now: () => current,
      sleep: async (ms: number) => {
        sleeps.push(ms);
        current += ms;
      },
    },
    sleeps,
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}
