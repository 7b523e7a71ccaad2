import { describe, it, expect, beforeEach } from 'vitest';
import { createMockTransport, type MockTransport } from '../../__tests__/mock-transport.js';
import {
  createKeysightOscilloscope,
  parseWaveformPreamble,
  type KeysightOscilloscopeDevice,
} from '../keysight-oscilloscope.js';
import { PNG_SIGNATURE } from '../waveform.js';

describe('Keysight Oscilloscope Driver', () => {
  let transport: MockTransport;
  let driver: KeysightOscilloscopeDevice;

  beforeEach(async () => {
    transport = createMockTransport({
      responses: {
        '*IDN?': 'KEYSIGHT TECHNOLOGIES,DSO-X 3034T,MY00000001,07.20.2019051434',
        ':MEASure:VAVerage?': '+1.25E-01',
        ':MEASure:VPP?': '9.9E+37',
        ':TIMebase:SCALe?': '+1.0E-03',
        ':WAVeform:PREamble?': '0,0,4,1,5.0E-01,0,0,2.5E-01,0,128',
      },
      binaryResponses: {
        ':WAVeform:DATA?': Buffer.concat([Buffer.from('#14'), Buffer.from([128, 129, 127, 138]), Buffer.from('\n')]),
        ':DISPlay:DATA? PNG, COLor': Buffer.concat([Buffer.from('#18'), PNG_SIGNATURE]),
      },
    });
    driver = createKeysightOscilloscope(transport);
    await driver.initialize();
    transport.reset();
  });

  describe('measurements', () => {
    it('should select the source before measuring', async () => {
      expect(await driver.getVoltageAverage(1)).toEqual({ ok: true, value: 0.125 });
      expect(transport.sentCommands).toEqual([':MEASure:SOURce CHANnel1', ':MEASure:VAVerage?']);
    });

    it('should reject the overflow value', async () => {
      const result = await driver.getPeakToPeak(3);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('KeysightOscilloscope :MEASure:VPP?: overflow (9.91E37)');
      }
    });
  });

  describe('getTrace()', () => {
    it('should scale the bytes with the preamble and restore the time base', async () => {
      const result = await driver.getTrace(2);

      expect(result).toEqual({
        ok: true,
        value: [
          [0, 0.5, 1, 1.5],
          [0, 0.25, -0.25, 2.5],
        ],
      });
      expect(transport.sentCommands).toEqual([
        ':ACQuire:TYPE NORMal',
        ':WAVeform:SOURce CHANnel2',
        ':WAVeform:POINts:MODE NORMal',
        ':WAVeform:FORMat BYTE',
        ':TIMebase:SCALe?',
        ':WAVeform:PREamble?',
        ':WAVeform:DATA?',
        ':TIMebase:SCALe +1.0E-03',
      ]);
    });

    it('should fail on a short preamble', async () => {
      transport.responses[':WAVeform:PREamble?'] = '0,0,4';

      const result = await driver.getTrace(1);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('KeysightOscilloscope preamble: expected 10 preamble fields, got 3');
      }
    });
  });

  it('should read the screenshot block', async () => {
    expect(await driver.getScreenshot()).toEqual({ ok: true, value: PNG_SIGNATURE });
    expect(transport.sentCommands).toEqual([':HARDcopy:INKSaver OFF', ':DISPlay:DATA? PNG, COLor']);
  });

  it('should set the time scale', async () => {
    await driver.setTimeScale(0.002);
    expect(transport.sentCommands).toEqual([':TIMebase:SCALe 0.002']);
  });

  describe('parseWaveformPreamble()', () => {
    it('should pick the scaling fields', () => {
      expect(parseWaveformPreamble('0,0,1000,1,1E-06,-5E-04,0,0.01,0.5,128')).toEqual({
        ok: true,
        value: {
          points: 1000,
          xIncrement: 0.000001,
          xOrigin: -0.0005,
          xReference: 0,
          yIncrement: 0.01,
          yOrigin: 0.5,
          yReference: 128,
        },
      });
    });
  });
});
