import { readFileSync, readdirSync, statSync } from 'fs';
import * as path from 'path';

/**
 * Domain, application and shared kernel layers must contain no NestJS
 * framework imports. Source dependencies point inward only.
 */

const ROOT = path.resolve(__dirname, '../../src');

const PURE_DIRECTORIES = [
  'betting/domain',
  'betting/application',
  'engine/domain',
  'player/domain',
  'rng/domain',
  'rng/application',
  'simulation/domain',
  'simulation/application',
  'stats/domain',
  'strategy/domain',
  'shared/kernel',
  'shared/ports',
];

const FORBIDDEN_PATTERNS: { pattern: RegExp; label: string }[] = [
  { pattern: /@Injectable/, label: '@Injectable decorator' },
  { pattern: /@Inject\b/, label: '@Inject decorator' },
  { pattern: /@Module/, label: '@Module decorator' },
  { pattern: /from\s+['"]@nestjs\//, label: '@nestjs/ import' },
  { pattern: /require\s*\(\s*['"]@nestjs\//, label: '@nestjs/ require' },
  { pattern: /from\s+['"](pino|zod)['"]/, label: 'infrastructure library import' },
];

function findTsFiles(dir: string): string[] {
  const results: string[] = [];
  const entries = readdirSync(dir);
  for (const entry of entries) {
    const full = path.join(dir, entry);
    const stat = statSync(full);
    if (stat.isDirectory()) {
      results.push(...findTsFiles(full));
    } else if (entry.endsWith('.ts')) {
      results.push(full);
    }
  }
  return results;
}

describe('Domain purity', () => {
  const violations: string[] = [];
  let totalFiles = 0;

  beforeAll(() => {
    for (const dir of PURE_DIRECTORIES) {
      const absDir = path.join(ROOT, dir);
      const files = findTsFiles(absDir);
      totalFiles += files.length;

      for (const absPath of files) {
        const content = readFileSync(absPath, 'utf-8');
        const relPath = path.relative(ROOT, absPath);

        for (const { pattern, label } of FORBIDDEN_PATTERNS) {
          if (pattern.test(content)) {
            violations.push(`${relPath}: found ${label}`);
          }
        }
      }
    }
  });

  it('has no framework imports in domain, application, or shared kernel layers', () => {
    expect(violations).toEqual([]);
  });

  it('scans at least 30 source files (sanity check)', () => {
    expect(totalFiles).toBeGreaterThanOrEqual(30);
  });
});
