import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createMockTransport, type MockTransport } from '../../__tests__/mock-transport.js';
import { createSTF03D, decodeFlags, STF03D, ALARM_CODES, type STF03DDevice } from '../applied-motion-stf03d.js';

describe('Applied Motion STF03D Driver', () => {
  let transport: MockTransport;
  let driver: STF03DDevice;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    transport = createMockTransport({
      responses: {
        MV: 'MV=100F024',
        AL: 'AL=0000',
        SC: 'SC=0019',
        MR: 'MR=3',
        SP: 'SP=1000',
        IP: 'IP=FFFFFFFA',
        AC: 'AC=1.000',
        VE: 'VE=2.0000',
        CI: 'CI=0.50',
      },
    });
    driver = createSTF03D(transport, 4);
    await driver.initialize();
    transport.reset();
  });

  afterEach(() => {
    log.mockRestore();
  });

  it('should identify by model and revision', async () => {
    expect(log).toHaveBeenCalledWith('[STF03D] Connected to: MV=100F024');
    expect(await driver.idn).toEqual({ ok: true, value: '100F024' });
  });

  describe('alarm and status', () => {
    it('should report no alarms for a zero code', async () => {
      expect(await driver.alarm).toEqual({ ok: true, value: ['No alarms'] });
    });

    it('should name every alarm bit that is set', async () => {
      transport.responses.AL = 'AL=0081';
      expect(await driver.alarm).toEqual({ ok: true, value: ['Position Limit', 'Over Current'] });
    });

    it('should decode status flags and the moving bit', async () => {
      expect(await driver.status).toEqual({ ok: true, value: ['Motor enabled', 'In position', 'Moving'] });
      expect(await driver.isMoving).toEqual({ ok: true, value: true });
    });

    it('should reject a reply without the register echo', async () => {
      transport.responses.AC = '%';

      const result = await driver.acceleration;

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('STF03D AC: unexpected reply "%"');
      }
    });
  });

  describe('positions', () => {
    it('should convert steps into calibrated units', async () => {
      // MR=3 is 2000 steps per turn, 4 units per turn
      expect(await driver.position).toEqual({ ok: true, value: 2 });
      expect(transport.sentCommands).toEqual(['MR', 'SP']);
    });

    it('should read the trajectory position as a signed step count', async () => {
      expect(await driver.immediatePosition).toEqual({ ok: true, value: -6 });
    });

    it('should refuse positions until a calibration is set', async () => {
      const uncalibrated = createSTF03D(transport);
      await uncalibrated.initialize();
      transport.reset();

      const result = await uncalibrated.moveRelative(1);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('STF03D: set the calibration before using positions');
      }
      expect(transport.sentCommands).toEqual([]);

      expect(await uncalibrated.setCalibration(360)).toEqual({ ok: true, value: undefined });
      expect((await uncalibrated.setCalibration(0)).ok).toBe(false);
    });
  });

  describe('motion', () => {
    it('should set the distance and start a relative or absolute move', async () => {
      await driver.moveRelative(1.5);
      await driver.moveAbsolute(-0.5);

      expect(transport.sentCommands).toEqual(['MR', 'DI750', 'FL', 'MR', 'DI-250', 'FP']);
      expect(log).toHaveBeenCalledWith('[STF03D] Move by 1.5, equivalent to 750 steps');
      expect(log).toHaveBeenCalledWith('[STF03D] Move to -0.5, equivalent to -250 steps');
    });

    it('should send speed, ramp and current settings', async () => {
      await driver.setSpeed(2);
      await driver.setAcceleration(1.5);
      await driver.setIdleCurrent(0.5);
      await driver.resetPosition();

      expect(transport.sentCommands).toEqual(['VE2', 'AC1.5', 'CI0.5', 'SP0']);
      expect(await driver.speed).toEqual({ ok: true, value: 2 });
      expect(await driver.idleCurrent).toEqual({ ok: true, value: 0.5 });
    });

    it('should only accept known microstep resolutions', async () => {
      const result = await driver.setMicrostep(2);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'STF03D: microstep resolution must be one of 0, 1, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, got 2'
        );
      }
      await driver.setMicrostep(8);
      expect(transport.sentCommands).toEqual(['MR8']);
    });
  });

  describe('definition', () => {
    it('should default to the eSCL ports on all interfaces', () => {
      expect(STF03D.params.parse({ host: '10.0.0.51' })).toEqual({
        host: '10.0.0.51',
        port: 7775,
        localAddress: '0.0.0.0',
        localPort: 15005,
      });
    });
  });
});

describe('decodeFlags()', () => {
  it('should list set bits in table order', () => {
    expect(decodeFlags(0x1002, ALARM_CODES, 'No alarms')).toEqual(['CCW Limit', 'No Move']);
  });
});
