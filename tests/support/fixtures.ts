import { readFileSync } from 'fs';
import { join } from 'path';

export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, '..', 'fixtures', name), 'utf8');
}
