import fs from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { DEFAULT_PROTOCOL_PARAMETERS } from '../leverage.config.js';
import { fixed, macro } from '../math/fixed-point.js';
import {
  isValidatorKey,
  loadParametersFile,
  resolveBootParameters,
  validateFeeDistribution,
  validateParameters,
  validateRateCurve,
  validateRiskParameters,
  validateTierParameters,
} from '../params/protocol.params.js';
import { HOTKEY, expectThrowsCode } from './fixtures.js';

const CONFIG_FILE = fileURLToPath(new URL('../../../../config/protocol.params.json', import.meta.url));

describe('protocol parameters', () => {
  describe('setter rules', () => {
    it('accepts the defaults', () => {
      expect(() => validateParameters(DEFAULT_PROTOCOL_PARAMETERS)).not.toThrow();
    });

    it('bounds leverage and the liquidation threshold', () => {
      expectThrowsCode(() => validateRiskParameters(fixed('1'), fixed('1.1')), 'INVALID_PARAMETER');
      expectThrowsCode(() => validateRiskParameters(fixed('21'), fixed('1.1')), 'INVALID_PARAMETER');
      expectThrowsCode(() => validateRiskParameters(fixed('10'), fixed('1')), 'INVALID_PARAMETER');
      expect(() => validateRiskParameters(fixed('20'), fixed('2'))).not.toThrow();
    });

    it('requires distributions to sum to 100%', () => {
      expectThrowsCode(
        () => validateFeeDistribution('trading', { lpShare: fixed('0.5'), liquidatorShare: 0n, protocolShare: fixed('0.4') }),
        'DISTRIBUTION_SUM_MISMATCH',
      );
    });

    it('requires ascending tier thresholds', () => {
      const { tierFeeDiscounts, tierMaxLeverages } = DEFAULT_PROTOCOL_PARAMETERS;
      expectThrowsCode(
        () =>
          validateTierParameters(
            [macro('100'), macro('100'), macro('5000'), macro('20000'), macro('100000')],
            tierFeeDiscounts,
            tierMaxLeverages,
            fixed('10'),
          ),
        'INVALID_PARAMETER',
      );
    });

    it('bounds the rate curve', () => {
      const curve = DEFAULT_PROTOCOL_PARAMETERS.rateCurve;
      expectThrowsCode(() => validateRateCurve(fixed('0.00005'), { ...curve, kink: 0n }), 'INVALID_PARAMETER');
      expectThrowsCode(() => validateRateCurve(fixed('0.5'), { ...curve, slope2: fixed('0.6') }), 'INVALID_PARAMETER');
    });

    it('recognises validator keys', () => {
      expect(isValidatorKey(HOTKEY)).toBe(true);
      expect(isValidatorKey(`0x${'0'.repeat(64)}`)).toBe(false);
      expect(isValidatorKey('0x1234')).toBe(false);
    });
  });

  describe('loadParametersFile', () => {
    let dir: string;

    beforeAll(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'leverage-params-'));
    });

    afterAll(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeParams(name: string, content: unknown): string {
      const file = path.join(dir, name);
      fs.writeFileSync(file, JSON.stringify(content));
      return file;
    }

    it('reads the shipped config file', () => {
      expect(loadParametersFile(CONFIG_FILE, DEFAULT_PROTOCOL_PARAMETERS)).toEqual(DEFAULT_PROTOCOL_PARAMETERS);
    });

    it('overrides only the keys present', () => {
      const file = writeParams('partial.json', { tradingFeeRate: '1000000', treasury: 'dao' });

      const params = loadParametersFile(file, DEFAULT_PROTOCOL_PARAMETERS);

      expect(params.tradingFeeRate).toBe(1_000_000n);
      expect(params.treasury).toBe('dao');
      expect(params.maxLeverage).toBe(DEFAULT_PROTOCOL_PARAMETERS.maxLeverage);
    });

    it('rejects malformed values', () => {
      const file = writeParams('malformed.json', { tradingFeeRate: 'abc' });
      expectThrowsCode(() => loadParametersFile(file, DEFAULT_PROTOCOL_PARAMETERS), 'INVALID_PARAMETER');
    });

    it('rejects values that break a setter rule', () => {
      const file = writeParams('too-high.json', { tradingFeeRate: '20000000' });
      expectThrowsCode(() => loadParametersFile(file, DEFAULT_PROTOCOL_PARAMETERS), 'INVALID_PARAMETER');
    });

    it('applies the treasury override on top of the parameters file', () => {
      const file = writeParams('with-treasury.json', { tradingFeeRate: '1000000', treasury: 'dao' });

      const params = resolveBootParameters({ paramsPath: file, treasury: 'multisig' }, DEFAULT_PROTOCOL_PARAMETERS);

      expect(params.treasury).toBe('multisig');
      expect(params.tradingFeeRate).toBe(1_000_000n);
    });

    it('keeps the file treasury when no override is given', () => {
      const file = writeParams('file-treasury.json', { treasury: 'dao' });
      expect(resolveBootParameters({ paramsPath: file }, DEFAULT_PROTOCOL_PARAMETERS).treasury).toBe('dao');
    });

    it('overrides the defaults without touching them', () => {
      const params = resolveBootParameters({ treasury: 'multisig' }, DEFAULT_PROTOCOL_PARAMETERS);

      expect(params.treasury).toBe('multisig');
      expect(DEFAULT_PROTOCOL_PARAMETERS.treasury).toBe('treasury');
    });

    it('rejects an empty treasury override', () => {
      expectThrowsCode(() => resolveBootParameters({ treasury: '' }, DEFAULT_PROTOCOL_PARAMETERS), 'INVALID_PARAMETER');
    });
  });
});
