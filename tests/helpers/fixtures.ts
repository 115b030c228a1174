/**
 * Test Fixtures
 *
 * Shared test data for unit tests across the embedkit codebase.
 * Keep these minimal and focused on what each test category needs.
 */

import { DEFAULT_PERFORMANCE, type Settings, settingsSchema } from '@/config/schema';
import type { ClientDescriptor } from '@/core/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Vector Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Unit vector pointing in positive x direction */
export const UNIT_VECTOR_X = [1, 0, 0];

/** Zero vector */
export const ZERO_VECTOR = [0, 0, 0];

/** Non-normalized vector for L2 normalization tests */
export const UNNORMALIZED_VECTOR = [3, 4, 0]; // magnitude = 5

/** Already normalized vector (magnitude = 1) */
export const NORMALIZED_VECTOR = [0.6, 0.8, 0]; // 3/5, 4/5, 0

// ═══════════════════════════════════════════════════════════════════════════════
// Image Fixtures (magic bytes plus a little padding)
// ═══════════════════════════════════════════════════════════════════════════════

export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0]);
export const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0, 0]);
export const GIF_BYTES = new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]);
export const WEBP_BYTES = new Uint8Array([
  0x52, 0x49, 0x46, 0x46, 0x24, 0, 0, 0, 0x57, 0x45, 0x42, 0x50
]);

/** One-byte "images" whose byte is their index; the mocks key off it */
export function indexedImages(count: number): Uint8Array[] {
  return Array.from({ length: count }, (_, i) => new Uint8Array([i]));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Placeholder credentials; never real keys */
export const TEST_ENV: NodeJS.ProcessEnv = {
  OPENAI_API_KEY: 'test-openai-key',
  GEMINI_API_KEY: 'test-gemini-key',
  ANTHROPIC_API_KEY: 'test-anthropic-key'
};

export function createTestSettings(overrides: Record<string, unknown> = {}): Settings {
  return settingsSchema.parse(overrides);
}

export function createDescriptor(overrides: Partial<ClientDescriptor> = {}): ClientDescriptor {
  return {
    provider: 'openai',
    model: 'text-embedding-3-small',
    credential: 'test-secret',
    normalize: false,
    performance: { ...DEFAULT_PERFORMANCE },
    dedicatedBudget: false,
    ...overrides
  };
}
