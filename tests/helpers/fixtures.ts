import fs from 'node:fs';
import path from 'node:path';

const FIXTURE_DIR = path.join(__dirname, '..', 'fixtures');

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURE_DIR, name), 'utf8');
}

export function fixturePath(name: string): string {
  return path.join(FIXTURE_DIR, name);
}
