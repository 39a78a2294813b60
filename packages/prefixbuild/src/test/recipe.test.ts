import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { fileURLToPath } from 'node:url';
import {
  parseRecipe,
  loadRecipe,
  listRecipes,
  defaultRecipe,
  expandRecipe,
  compareVersions,
  recipeFeatures,
} from '../recipe/load.js';
import { formatCommandLine } from '../recipe/template.js';
import { RecipeError } from '../errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const REPO_RECIPES = path.resolve(__dirname, '..', '..', '..', '..', 'recipes');

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prefixbuild-recipe-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeRecipe(name: string, version: string, content: unknown): void {
  const dir = path.join(tmpDir, name, version);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(
    path.join(dir, 'recipe.json'),
    typeof content === 'string' ? content : JSON.stringify(content),
  );
}

function commandLines(prefix: string, recipe = defaultRecipe()): string[] {
  return expandRecipe(recipe, prefix).map(p => formatCommandLine(p.command, p.args));
}

describe('tears 1.2.3', () => {
  const expected = [
    'autoreconf -fi',
    './configure --prefix=/opt/irods-ext --with-irods CPPFLAGS=-I/opt/irods-ext/include LDFLAGS=-L/opt/irods-ext/lib',
    'make install prefix=/opt/irods-ext',
  ];

  it('built-in recipe expands to the three autotools steps', () => {
    assert.deepEqual(commandLines('/opt/irods-ext'), expected);
  });

  it('shipped recipe file matches the built-in one', () => {
    const recipe = loadRecipe(REPO_RECIPES, 'tears', '1.2.3');
    assert.deepEqual(commandLines('/opt/irods-ext', recipe), expected);
  });

  it('keeps a prefix with spaces as a single argument', () => {
    const configure = expandRecipe(defaultRecipe(), '/opt/my ext')[1];
    assert.equal(configure.args[0], '--prefix=/opt/my ext');
    assert.equal(configure.args.length, 4);
  });
});

describe('parseRecipe()', () => {
  it('applies autotools defaults', () => {
    const recipe = parseRecipe('{"name":"a","version":"1","autotools":{}}', 'inline');
    assert.deepEqual(recipe.autotools, { with: [], configureArgs: [], searchPaths: true });
  });

  it('expands autotools without search paths and with extra args', () => {
    const recipe = parseRecipe(JSON.stringify({
      name: 'a', version: '1',
      autotools: { with: ['ssl'], configureArgs: ['--disable-static'], searchPaths: false },
    }), 'inline');
    assert.deepEqual(expandRecipe(recipe, '/p')[1].args, ['--prefix=/p', '--with-ssl', '--disable-static']);
  });

  it('uses explicit phases with NAME and VERSION', () => {
    const recipe = parseRecipe(JSON.stringify({
      name: 'lib', version: '2.0',
      phases: [{ name: 'install', command: 'make', args: ['install', 'DESTDIR=${PREFIX}/${NAME}-${VERSION}'] }],
    }), 'inline');
    assert.deepEqual(expandRecipe(recipe, '/p'), [
      { name: 'install', command: 'make', args: ['install', 'DESTDIR=/p/lib-2.0'] },
    ]);
    assert.deepEqual(recipeFeatures(recipe), []);
  });

  it('rejects a recipe with both autotools and phases', () => {
    assert.throws(() => parseRecipe(JSON.stringify({
      name: 'a', version: '1', autotools: {}, phases: [{ name: 'x', command: 'true' }],
    }), 'inline'), RecipeError);
  });

  it('rejects a recipe with neither autotools nor phases', () => {
    assert.throws(() => parseRecipe('{"name":"a","version":"1"}', 'inline'), RecipeError);
  });

  it('rejects feature names that are not plain words', () => {
    assert.throws(
      () => parseRecipe('{"name":"a","version":"1","autotools":{"with":["x y"]}}', 'inline'),
      (err: unknown) => {
        assert.ok(err instanceof RecipeError);
        assert.ok(err.details[0].startsWith('autotools.with.0: '));
        return true;
      },
    );
  });

  it('rejects invalid JSON', () => {
    assert.throws(() => parseRecipe('{', 'inline'), RecipeError);
  });
});

describe('loadRecipe()', () => {
  it('fails for a missing recipe', () => {
    assert.throws(() => loadRecipe(tmpDir, 'nope', '1.0'), RecipeError);
  });

  it('fails when the recipe declares a different version', () => {
    writeRecipe('tears', '1.2.3', { name: 'tears', version: '1.2.4', autotools: {} });
    assert.throws(() => loadRecipe(tmpDir, 'tears', '1.2.3'), /declares tears 1\.2\.4/);
  });
});

describe('listRecipes()', () => {
  it('returns an empty listing for a missing directory', () => {
    assert.deepEqual(listRecipes(path.join(tmpDir, 'missing')), { recipes: [], invalid: [] });
  });

  it('sorts by name then numeric version and collects invalid files', () => {
    writeRecipe('zlib', '1.3', { name: 'zlib', version: '1.3', autotools: {} });
    writeRecipe('tears', '1.10.0', { name: 'tears', version: '1.10.0', autotools: {} });
    writeRecipe('tears', '1.2.3', { name: 'tears', version: '1.2.3', autotools: {} });
    writeRecipe('broken', '1', '{');
    fs.mkdirSync(path.join(tmpDir, 'empty', '1'), { recursive: true });

    const { recipes, invalid } = listRecipes(tmpDir);
    assert.deepEqual(recipes.map(r => `${r.name}@${r.version}`), ['tears@1.2.3', 'tears@1.10.0', 'zlib@1.3']);
    assert.equal(invalid.length, 1);
    assert.equal(invalid[0].file, path.join(tmpDir, 'broken', '1', 'recipe.json'));
  });
});

describe('compareVersions()', () => {
  it('compares numerically part by part', () => {
    assert.ok(compareVersions('1.2.3', '1.10.0') < 0);
    assert.ok(compareVersions('4.1.12', '4.1.9') > 0);
    assert.equal(compareVersions('1.0', '1.0'), 0);
  });

  it('orders a shorter version first', () => {
    assert.ok(compareVersions('1.2', '1.2.1') < 0);
  });

  it('falls back to lexical order for non-numeric parts', () => {
    assert.ok(compareVersions('1.0a', '1.0b') < 0);
  });
});
