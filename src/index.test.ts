import { describe, it, expect } from 'vitest';
import { VERSION, ErrorCode, createCore } from './index.js';

describe('index', () => {
  it('exports a version string', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('exports the public API', () => {
    expect(ErrorCode.AGENT_NOT_FOUND).toBe('AGENT_NOT_FOUND');
    expect(typeof createCore).toBe('function');
  });
});
