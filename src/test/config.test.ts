import { Effect, Either } from 'effect';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  DEFAULT_RENDER_OPTIONS,
  isDebugEnabled,
  resolveRenderOptions,
  resolveRenderOptionsEffect,
} from '../lib/config.js';
import { ValidationError } from '../lib/errors.js';

describe('resolveRenderOptions', () => {
  test('applies defaults', () => {
    expect(resolveRenderOptions()).toEqual(DEFAULT_RENDER_OPTIONS);
    expect(DEFAULT_RENDER_OPTIONS).toEqual({
      diagramServiceUrl: 'https://mermaid.ink/img',
      diagramTheme: 'default',
      sidebarWidth: '30%',
      contentWidth: '800px',
      tocExclude: '^(Authors|Table of Contents)$',
    });
  });

  test('keeps provided values', () => {
    const options = resolveRenderOptions({ diagramTheme: 'dark', contentWidth: '1024px' });

    expect(options.diagramTheme).toBe('dark');
    expect(options.contentWidth).toBe('1024px');
    expect(options.sidebarWidth).toBe('30%');
  });

  test('rejects column widths without a unit', () => {
    expect(() => resolveRenderOptions({ sidebarWidth: '30' })).toThrow(ValidationError);
  });

  test('rejects a diagram service URL that is not http(s)', () => {
    expect(() => resolveRenderOptions({ diagramServiceUrl: 'ftp://diagrams.example.com' })).toThrow(
      ValidationError,
    );
  });
});

describe('resolveRenderOptionsEffect', () => {
  test('rejects an unknown diagram theme', () => {
    const result = Effect.runSync(Effect.either(resolveRenderOptionsEffect({ diagramTheme: 'sepia' })));

    expect(Either.isLeft(result)).toBe(true);
  });

  test('fails with a ValidationError for non-object input', () => {
    const result = Effect.runSync(Effect.either(resolveRenderOptionsEffect('not options')));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe('ValidationError');
      expect(result.left.message).toContain('Invalid render options');
    }
  });
});

describe('isDebugEnabled', () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env.MDCONF_DEBUG;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.MDCONF_DEBUG = originalEnv;
    } else {
      delete process.env.MDCONF_DEBUG;
    }
  });

  test('reads MDCONF_DEBUG', () => {
    process.env.MDCONF_DEBUG = '1';
    expect(isDebugEnabled()).toBe(true);

    process.env.MDCONF_DEBUG = '0';
    expect(isDebugEnabled()).toBe(false);
  });
});
