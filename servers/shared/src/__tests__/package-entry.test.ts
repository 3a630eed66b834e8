/**
 * Package entry points
 * Node loads the compiled output at run time; the type-checker and Jest read the sources
 */

import fs from 'fs';
import path from 'path';

const packageDir = path.resolve(__dirname, '..', '..');

function readJson(file: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(packageDir, file), 'utf8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`${file} is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

describe('@card-triage/shared entry points', () => {
  const manifest = readJson('package.json');
  const buildConfig = readJson('tsconfig.build.json');

  it('should load compiled JavaScript at run time', () => {
    expect(manifest.main).toBe('dist/index.js');
    expect(manifest.exports).toEqual({
      '.': { types: './src/index.ts', default: './dist/index.js' },
    });
  });

  it('should compile the sources into the directory the runtime entry points at', () => {
    expect(buildConfig.compilerOptions).toMatchObject({ rootDir: 'src', outDir: 'dist' });
    expect(fs.existsSync(path.join(packageDir, 'src', 'index.ts'))).toBe(true);
  });

  it('should keep type information on the sources', () => {
    expect(manifest.types).toBe('src/index.ts');
  });
});
