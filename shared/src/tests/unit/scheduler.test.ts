import { isSchedulableInterval, toCronExpression } from '../../trading/scheduler.js';

describe('toCronExpression', () => {
  test('maps intervals onto cron schedules', () => {
    const cases = [
      { seconds: 1, expected: '*/1 * * * * *' },
      { seconds: 30, expected: '*/30 * * * * *' },
      { seconds: 60, expected: '* * * * *' },
      { seconds: 300, expected: '*/5 * * * *' },
      { seconds: 3600, expected: '0 * * * *' },
      { seconds: 7200, expected: '0 */2 * * *' },
      { seconds: 21600, expected: '0 */6 * * *' },
      { seconds: 86400, expected: '0 */24 * * *' },
    ];

    for (const testCase of cases) {
      expect(toCronExpression(testCase.seconds)).toBe(testCase.expected);
    }
  });

  test('rejects intervals cron cannot express', () => {
    for (const seconds of [0, -60, 1.5, 90, 5400, 172800]) {
      expect(() => toCronExpression(seconds)).toThrow();
      expect(isSchedulableInterval(seconds)).toBe(false);
    }
  });

  test('rejects steps that would leave an uneven gap at the minute, hour or day boundary', () => {
    for (const seconds of [45, 7, 420, 2100, 18000, 25200]) {
      expect(() => toCronExpression(seconds)).toThrow(`Interval ${seconds}s cannot be expressed as a cron schedule`);
      expect(isSchedulableInterval(seconds)).toBe(false);
    }
  });

  test('isSchedulableInterval accepts the default poll and summary intervals', () => {
    expect(isSchedulableInterval(60)).toBe(true);
    expect(isSchedulableInterval(3600)).toBe(true);
  });
});
