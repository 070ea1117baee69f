/**
 * Fixture loading for tests.
 */
import { readFileSync } from 'node:fs';

export function loadRegistryFixture(name: string): string {
  return readFileSync(new URL(`./registry/${name}`, import.meta.url), 'utf-8');
}
