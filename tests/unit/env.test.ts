import {
  buildConfig,
  loadConfig,
  parseEnv,
  resetConfigCache,
  resolveConfig,
} from '../../src/shared/config/env';
import { decodeLines } from '../../src/shared/engine/contracts/serialization';
import { InvalidArgumentError } from '../../src/shared/engine/errors';
import { PuzzleState } from '../../src/shared/engine/PuzzleState';

describe('environment config', () => {
  afterEach(() => {
    resetConfigCache();
  });

  describe('parseEnv', () => {
    it('applies defaults', () => {
      expect(parseEnv({})).toEqual({
        success: true,
        data: {
          NODE_ENV: 'development',
          LOG_LEVEL: 'info',
          LOG_FORMAT: 'pretty',
          PUZZLE_STORAGE: 'auto',
        },
      });
    });

    it('reports invalid values by path', () => {
      const result = parseEnv({ LOG_LEVEL: 'loud', PUZZLE_STORAGE: 'disk' });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path)).toEqual(['LOG_LEVEL', 'PUZZLE_STORAGE']);
    });

    it('accepts every winston level', () => {
      expect(parseEnv({ LOG_LEVEL: 'verbose' }).data?.LOG_LEVEL).toBe('verbose');
      expect(parseEnv({ LOG_LEVEL: 'silly' }).data?.LOG_LEVEL).toBe('silly');
    });
  });

  describe('buildConfig', () => {
    it('treats Jest runs as the test environment', () => {
      const config = buildConfig({
        NODE_ENV: 'production',
        LOG_LEVEL: 'warn',
        LOG_FORMAT: 'json',
        PUZZLE_STORAGE: 'array',
      });
      expect(config).toEqual({
        nodeEnv: 'test',
        logging: { level: 'warn', format: 'json' },
        storage: 'array',
      });
    });
  });

  describe('loadConfig', () => {
    it('throws on invalid configuration', () => {
      resetConfigCache();
      expect(() => loadConfig({ LOG_FORMAT: 'xml' })).toThrow(InvalidArgumentError);
      expect(() => loadConfig({ LOG_FORMAT: 'xml' })).toThrow('LOG_FORMAT');
    });

    it('caches the first successful load', () => {
      resetConfigCache();
      const first = loadConfig({ PUZZLE_STORAGE: 'array' });
      expect(loadConfig({ PUZZLE_STORAGE: 'packed' })).toBe(first);
    });

    it('sets the default storage for new states', () => {
      resetConfigCache();
      loadConfig({ PUZZLE_STORAGE: 'array' });
      expect(PuzzleState.fromSide(3).storageKind).toBe('array');
      expect(PuzzleState.fromSide(3, { storage: 'packed' }).storageKind).toBe('packed');
    });

    it('falls back to arrays for boards too large for a configured packed default', () => {
      resetConfigCache();
      loadConfig({ PUZZLE_STORAGE: 'packed' });
      expect(PuzzleState.fromSide(4).storageKind).toBe('packed');

      const big = PuzzleState.fromSide(5);
      expect(big.storageKind).toBe('array');
      expect(big.isSolution()).toBe(true);

      const parsed = PuzzleState.parseLine(big.toLine());
      expect(parsed.storageKind).toBe('array');
      expect(parsed.equals(big)).toBe(true);
      expect(decodeLines(`${big.toLine()}\n${big.toLine()}`)).toHaveLength(2);

      expect(() => PuzzleState.fromSide(5, { storage: 'packed' })).toThrow(InvalidArgumentError);
    });
  });

  describe('resolveConfig', () => {
    it('falls back to defaults and reports the issues', () => {
      resetConfigCache();
      const { config, errors } = resolveConfig({ NODE_ENV: 'staging', LOG_LEVEL: 'loud' });
      expect(config).toEqual({
        nodeEnv: 'test',
        logging: { level: 'info', format: 'pretty' },
        storage: 'auto',
      });
      expect(errors.map((e) => e.path)).toEqual(['NODE_ENV', 'LOG_LEVEL']);
    });

    it('reports no issues for a valid environment and shares the cache', () => {
      resetConfigCache();
      const resolved = resolveConfig({ PUZZLE_STORAGE: 'array' });
      expect(resolved.errors).toEqual([]);
      expect(loadConfig()).toBe(resolved.config);
    });

    it('lets the engine load under an invalid environment', () => {
      const savedEnv = process.env;
      process.env = { ...savedEnv, NODE_ENV: 'staging', LOG_LEVEL: 'loud' };
      try {
        jest.isolateModules(() => {
          const engine: typeof import('../../src/shared/engine') = require('../../src/shared/engine');
          const state = engine.PuzzleState.fromSide(3);
          expect(state.isSolution()).toBe(true);
          expect(state.storageKind).toBe('packed');
        });
      } finally {
        process.env = savedEnv;
      }
    });
  });
});
