/**
 * Test utilities for fdx integration tests
 *
 * Temporary directories on the real filesystem, fixture helpers and a
 * descriptor backend that records every open and close.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { NodeBackend } from '../core/backend.js'

// ============================================================================
// TEMPORARY DIRECTORIES
// ============================================================================

/**
 * Create a fresh directory under the OS temp dir.
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'fdx-test-'))
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

// ============================================================================
// FIXTURES
// ============================================================================

/**
 * Write a fixture file and return its path.
 */
export function writeFixture(dir: string, name: string, content: string | Uint8Array): string {
  const path = join(dir, name)
  writeFileSync(path, content)
  return path
}

export function readFixture(path: string): Uint8Array {
  return new Uint8Array(readFileSync(path))
}

export function readFixtureText(path: string): string {
  return readFileSync(path, 'utf-8')
}

// ============================================================================
// COUNTING BACKEND
// ============================================================================

/**
 * NodeBackend that records descriptors as they are opened and closed.
 */
export class CountingBackend extends NodeBackend {
  readonly opened: number[] = []
  readonly closed: number[] = []

  override open(path: string, flags: number, mode: number): number {
    const fd = super.open(path, flags, mode)
    this.opened.push(fd)
    return fd
  }

  override close(fd: number): void {
    this.closed.push(fd)
    super.close(fd)
  }
}
