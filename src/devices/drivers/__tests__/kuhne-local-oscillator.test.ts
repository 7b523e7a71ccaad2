import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createMockTransport, type MockTransport } from '../../__tests__/mock-transport.js';
import { createLocalOscillator, MODEL_STRING, type LocalOscillatorDevice } from '../kuhne-local-oscillator.js';

describe('Kuhne Local Oscillator Driver', () => {
  let transport: MockTransport;
  let driver: LocalOscillatorDevice;

  beforeEach(async () => {
    transport = createMockTransport({ defaultResponse: 'A', responses: { sa: 'PLL locked' } });
    driver = createLocalOscillator(transport);
    await driver.initialize();
  });

  it('should report a fixed identification without talking to the device', async () => {
    expect(await driver.idn).toEqual({ ok: true, value: MODEL_STRING });
    expect(transport.sentCommands).toEqual([]);
  });

  it('should read the status', async () => {
    expect(await driver.getStatus()).toEqual({ ok: true, value: 'PLL locked' });
  });

  describe('digit groups', () => {
    it('should pad each group to three digits', async () => {
      await driver.setGigaHz(7);
      await driver.setMegaHz(20);
      await driver.setKiloHz(500);
      await driver.setHz(1);

      expect(transport.sentCommands).toEqual(['007GF1', '020MF1', '500kF1', '001HF1']);
    });

    it('should reject values outside 0-999 without sending', async () => {
      const result = await driver.setMegaHz(1000);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('LocalOscillator: digit group must be an integer 0-999, got 1000');
      }
      expect(transport.sentCommands).toEqual([]);
    });

    it('should fail when the oscillator does not answer A', async () => {
      transport.responses['042GF1'] = '?';

      const result = await driver.setGigaHz(42);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('LocalOscillator: command 042GF1 rejected ("?")');
      }
    });
  });

  describe('setFrequency()', () => {
    it('should split the frequency into the four groups', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});

      expect(await driver.setFrequency(7.02)).toEqual({ ok: true, value: undefined });

      expect(transport.sentCommands).toEqual(['007GF1', '020MF1', '000kF1', '000HF1']);
      expect(log).toHaveBeenCalledWith('[LocalOscillator] Frequency set to 07 GHz, 020 MHz, 000 kHz, and 000 Hz');
      log.mockRestore();
    });

    it('should resolve down to 1 Hz', async () => {
      await driver.setFrequency(12.345678901);

      expect(transport.sentCommands).toEqual(['012GF1', '345MF1', '678kF1', '901HF1']);
    });

    it('should stop at the first rejected group', async () => {
      transport.responses['020MF1'] = '';

      const result = await driver.setFrequency(7.02);

      expect(result.ok).toBe(false);
      expect(transport.sentCommands).toEqual(['007GF1', '020MF1']);
    });

    it('should reject negative frequencies', async () => {
      const result = await driver.setFrequency(-1);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('LocalOscillator: frequency out of range: -1 GHz');
      }
    });
  });
});
