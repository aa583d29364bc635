import { vi } from 'vitest';
import type { Logger } from '../src/types';

export const silentLogger = (): Logger => ({
  debug: vi.fn(),
  log: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const inputFormat = {
  attribute: 0x24,
  length: 5,
  ffw1: 0x40,
  ffw2: 0x00,
  fcw1: 0x00,
  fcw2: 0x00,
};
