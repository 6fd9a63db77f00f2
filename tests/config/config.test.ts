import { describe, it, expect } from 'vitest';
import { ConfigSchema, ConfigLoader, ConfigValidationError } from '../../src/config/index.js';

describe('ConfigSchema', () => {
  it('should fill every default from an empty object', () => {
    const config = ConfigSchema.parse({});

    expect(config.env).toBe('development');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 8000, maxBodyBytes: 65536 });
    expect(config.database).toEqual({
      type: 'sqlite',
      filename: 'expenses.db',
      busyTimeout: 5000,
      journalMode: 'wal',
      logging: false,
    });
    expect(config.observability.logging.level).toBe('info');
    expect(config.ledger.amountPolicy).toBe('lenient');
    expect(config.ledger.requireMonthForView).toBe(true);
    expect(config.ledger.shops).toContain('Costco');
  });

  it('should reject invalid port numbers', () => {
    const result = ConfigSchema.safeParse({ server: { port: 70000 } });
    expect(result.success).toBe(false);
  });
});

describe('ConfigLoader', () => {
  describe('load', () => {
    it('should keep supplied values', () => {
      const config = ConfigLoader.load({
        server: { port: 9000 },
        ledger: { amountPolicy: 'strict', yearsBefore: 5 },
      });

      expect(config.server.port).toBe(9000);
      expect(config.ledger.amountPolicy).toBe('strict');
      expect(config.ledger.yearsBefore).toBe(5);
      expect(config.ledger.yearsAfter).toBe(2);
    });

    it('should throw ConfigValidationError with paths', () => {
      try {
        ConfigLoader.load({ database: { type: 'postgres' }, ledger: { amountPolicy: 'loose' } });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors.map(e => e.path)).toEqual(['database.type', 'ledger.amountPolicy']);
          expect(error.message).toMatch(/^Configuration validation failed: database\.type: /);
        }
      }
    });
  });

  describe('fromEnv', () => {
    it('should use defaults for an empty environment', () => {
      expect(ConfigLoader.fromEnv({})).toEqual(ConfigSchema.parse({}));
    });

    it('should map environment variables onto the config', () => {
      const config = ConfigLoader.fromEnv({
        NODE_ENV: 'production',
        HOST: '127.0.0.1',
        PORT: '3100',
        EXPENSES_DB_TYPE: 'memory',
        EXPENSES_DB_PATH: '/tmp/ledger.db',
        EXPENSES_DB_LOGGING: 'yes',
        LOG_LEVEL: 'warn',
        LOG_PRETTY: 'false',
        AMOUNT_POLICY: 'strict',
        REQUIRE_MONTH_FOR_VIEW: '0',
      });

      expect(config.env).toBe('production');
      expect(config.server.host).toBe('127.0.0.1');
      expect(config.server.port).toBe(3100);
      expect(config.database.type).toBe('memory');
      expect(config.database.filename).toBe('/tmp/ledger.db');
      expect(config.database.logging).toBe(true);
      expect(config.observability.logging).toEqual({ level: 'warn', prettyPrint: false, redactPaths: [] });
      expect(config.ledger.amountPolicy).toBe('strict');
      expect(config.ledger.requireMonthForView).toBe(false);
    });

    it('should treat blank variables as unset', () => {
      expect(ConfigLoader.fromEnv({ PORT: '  ', LOG_LEVEL: '' }).server.port).toBe(8000);
    });

    it('should report malformed variables against their path', () => {
      expect(() => ConfigLoader.fromEnv({ PORT: 'eighty' })).toThrow(/server\.port/);
      expect(() => ConfigLoader.fromEnv({ LOG_PRETTY: 'maybe' })).toThrow(
        /observability\.logging\.prettyPrint/
      );
    });
  });
});
