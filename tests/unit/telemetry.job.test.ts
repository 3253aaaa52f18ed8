import cron from 'node-cron';
import { intervalToCron, startTelemetryJob } from '@/jobs/telemetry.job';
import { buildTelemetryPayload, publishTelemetry, TelemetryDeps } from '@/services/telemetry.service';
import { SensorReading } from '@/types/sensor.types';
import { SignedCommand } from '@/types/envelope.types';
import { ConfigError } from '@/utils/errors.utils';

jest.mock('node-cron', () => ({
  __esModule: true,
  default: {
    validate: jest.fn(() => true),
    schedule: jest.fn(() => ({ start: jest.fn(), stop: jest.fn() })),
  },
}));

const mockedCron = jest.mocked(cron);

const reading: SensorReading = {
  sensor_id: 'temp_1',
  sensor_type: 'thermo',
  data: { temperature: 21 },
  timestamp: 1,
  status: 'success',
};

const signed: SignedCommand = { cmd: '{}', hash: 'h', sigs: [] };

const deps = (overrides: Partial<TelemetryDeps> = {}): TelemetryDeps => ({
  deviceId: 'device-1',
  readAll: jest.fn().mockResolvedValue([reading]),
  sign: jest.fn().mockReturnValue(signed),
  publish: jest.fn(),
  ...overrides,
});

describe('Telemetry', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  test('should aggregate readings into one payload', () => {
    expect(buildTelemetryPayload('device-1', [reading])).toEqual({
      device_id: 'device-1',
      sensors: [reading],
      count: 1,
    });
  });

  test('should sign and publish on the device topic', async () => {
    const telemetry = deps();

    const payload = await publishTelemetry(telemetry);

    expect(payload?.count).toBe(1);
    expect(telemetry.sign).toHaveBeenCalledWith({ device_id: 'device-1', sensors: [reading], count: 1 });
    expect(telemetry.publish).toHaveBeenCalledWith('device-1', signed);
  });

  test('should swallow a failed cycle', async () => {
    const telemetry = deps({
      publish: jest.fn(() => {
        throw new Error('not connected');
      }),
    });

    await expect(publishTelemetry(telemetry)).resolves.toBeNull();
  });

  test('should schedule the job with the given expression', () => {
    startTelemetryJob(deps(), '*/30 * * * * *');

    expect(mockedCron.schedule).toHaveBeenCalledWith('*/30 * * * * *', expect.any(Function));
  });

  test('should reject an invalid schedule', () => {
    mockedCron.validate.mockReturnValueOnce(false);
    expect(() => startTelemetryJob(deps(), 'every minute')).toThrow(ConfigError);
  });

  test('should skip a tick while the previous one is still running', async () => {
    let release: (readings: SensorReading[]) => void = () => undefined;
    const readAll = jest.fn(
      () =>
        new Promise<SensorReading[]>((resolve) => {
          release = resolve;
        })
    );
    const telemetry = deps({ readAll });
    startTelemetryJob(telemetry, '*/30 * * * * *');
    const tick = mockedCron.schedule.mock.calls[0][1];
    if (typeof tick !== 'function') {
      throw new Error('expected a scheduled function');
    }

    const first = tick(new Date());
    const second = tick(new Date());
    release([reading]);
    await Promise.all([first, second]);

    expect(readAll).toHaveBeenCalledTimes(1);
    expect(telemetry.publish).toHaveBeenCalledTimes(1);
  });

  describe('intervalToCron', () => {
    test.each([
      [30, '*/30 * * * * *'],
      [60, '0 */1 * * * *'],
      [300, '0 */5 * * * *'],
      [3600, '0 0 * * * *'],
    ])('should convert %i seconds', (seconds, expected) => {
      expect(intervalToCron(seconds)).toBe(expected);
    });

    test('should reject intervals cron cannot express', () => {
      expect(() => intervalToCron(45)).toThrow(ConfigError);
      expect(() => intervalToCron(0)).toThrow(ConfigError);
    });
  });
});
