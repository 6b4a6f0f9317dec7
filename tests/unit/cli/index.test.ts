/**
 * Tests for the CLI program definition.
 */
import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register every command', () => {
    expect(createCli().commands.map((c) => c.name())).toEqual([
      'serve',
      'about',
      'member',
      'curator',
      'rulebook',
      'join',
      'tax',
      'versions',
      'advisory',
    ]);
  });

  it('should name the program', () => {
    expect(createCli().name()).toBe('community-oracle');
  });
});
