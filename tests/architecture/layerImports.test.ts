import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';
import { test } from '../testHarness';

interface LayerRule {
  layer: string;
  /** Import prefixes the layer may not use. */
  banned: readonly string[];
  /** When set, `@/` imports must start with one of these. */
  allowedAliases?: readonly string[];
}

const srcRoot = path.resolve(__dirname, '..', '..', 'src');

const LAYER_RULES: readonly LayerRule[] = [
  {
    layer: 'domain',
    banned: ['node:'],
    allowedAliases: ['@/domain', '@/shared/utils'],
  },
  {
    layer: 'ports',
    banned: ['node:'],
    allowedAliases: ['@/domain', '@/ports'],
  },
  {
    layer: 'application',
    banned: ['@/adapters', '@/infrastructure', '@/commands', '@/runtime', 'node:dgram', 'node:fs'],
  },
  {
    layer: 'shared',
    banned: ['@/domain', '@/application', '@/adapters', '@/commands', '@/runtime', '@/config'],
  },
  {
    layer: 'adapters',
    banned: ['@/application', '@/commands', '@/runtime'],
  },
];

const SPECIFIER = /(?:import|export)\s[^;]*?from\s+['"]([^'"]+)['"]|import\(\s*['"]([^'"]+)['"]\s*\)/g;

function sourceFiles(dir: string): string[] {
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      return sourceFiles(full);
    }
    return entry.name.endsWith('.ts') ? [full] : [];
  });
}

function specifiers(file: string): string[] {
  const content = fs.readFileSync(file, 'utf8');
  return [...content.matchAll(SPECIFIER)].map((match) => match[1] ?? match[2]);
}

function violationsOf(rule: LayerRule): string[] {
  const found: string[] = [];
  for (const file of sourceFiles(path.join(srcRoot, rule.layer))) {
    const relative = path.relative(srcRoot, file);
    for (const specifier of specifiers(file)) {
      const banned = rule.banned.find((prefix) => specifier.startsWith(prefix));
      if (banned) {
        found.push(`${relative}: ${specifier} (${rule.layer} may not use ${banned})`);
      } else if (
        rule.allowedAliases &&
        specifier.startsWith('@/') &&
        !rule.allowedAliases.some((prefix) => specifier.startsWith(prefix))
      ) {
        found.push(`${relative}: ${specifier} (${rule.layer} only reaches ${rule.allowedAliases.join(', ')})`);
      }
    }
  }
  return found;
}

for (const rule of LAYER_RULES) {
  test(`${rule.layer} keeps to its allowed imports`, () => {
    assert.ok(sourceFiles(path.join(srcRoot, rule.layer)).length > 0, `src/${rule.layer} has no sources`);
    assert.deepEqual(violationsOf(rule), []);
  });
}

test('sources import each other through the @/ alias', () => {
  const relativeImports = sourceFiles(srcRoot).flatMap((file) =>
    specifiers(file)
      .filter((specifier) => specifier.startsWith('.'))
      .map((specifier) => `${path.relative(srcRoot, file)}: ${specifier}`),
  );
  assert.deepEqual(relativeImports, []);
});

test('only the uploader opens TCP sockets outside the adapters', () => {
  const users = sourceFiles(srcRoot)
    .filter((file) => specifiers(file).includes('node:net'))
    .map((file) => path.relative(srcRoot, file).split(path.sep).join('/'))
    .filter((file) => !file.startsWith('adapters/'));
  assert.deepEqual(users, ['application/upload/sequenceUploader.ts']);
});
