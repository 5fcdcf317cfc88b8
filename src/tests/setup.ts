/**
 * Panel Test Setup
 *
 * Global test configuration and browser API stand-ins for Vitest.
 */

import { vi, beforeAll, afterAll, afterEach } from 'vitest';
import { cleanup } from '@testing-library/react';
import '@testing-library/jest-dom/vitest';

// Observers record what they watch so tests can drive resizes
class MockResizeObserver {
  static instances: MockResizeObserver[] = [];

  readonly observed: Element[] = [];

  constructor(public readonly callback: ResizeObserverCallback) {
    MockResizeObserver.instances.push(this);
  }

  observe(target: Element): void {
    this.observed.push(target);
  }

  unobserve(target: Element): void {
    const index = this.observed.indexOf(target);
    if (index >= 0) this.observed.splice(index, 1);
  }

  disconnect(): void {
    this.observed.length = 0;
  }
}

vi.stubGlobal('ResizeObserver', MockResizeObserver);

// Mock window.matchMedia (reduced-motion queries)
Object.defineProperty(window, 'matchMedia', {
  writable: true,
  value: vi.fn().mockImplementation((query: string) => ({
    matches: false,
    media: query,
    onchange: null,
    addListener: vi.fn(),
    removeListener: vi.fn(),
    addEventListener: vi.fn(),
    removeEventListener: vi.fn(),
    dispatchEvent: vi.fn(),
  })),
});

afterEach(() => {
  cleanup();
  vi.clearAllMocks();
  MockResizeObserver.instances = [];
});

// Quiet expected error/warn output unless DEBUG is set
const originalError = console.error;
const originalWarn = console.warn;

beforeAll(() => {
  console.error = (...args: unknown[]) => {
    if (process.env.DEBUG) originalError(...args);
  };
  console.warn = (...args: unknown[]) => {
    if (process.env.DEBUG) originalWarn(...args);
  };
});

afterAll(() => {
  console.error = originalError;
  console.warn = originalWarn;
});

export { MockResizeObserver };
