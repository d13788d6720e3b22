import assert from 'node:assert/strict';
import fs from 'fs-extra';
import test from 'node:test';

import { parseFrameworkYaml } from '../lib/framework_document.js';
import {
  DEFAULT_METADATA_TEMPLATES,
  addMetadataToCorpus,
  addMetadataToFile,
  applyMetadata,
  selectMetadataTemplate,
  titleCase,
  type MetadataTemplate
} from '../lib/metadata.js';
import { captureConsole, withTempCwd, writeFixtureFile, writeRawFixtureFile } from './test_fs.js';

const TEMPLATE: MetadataTemplate = {
  purpose: 'Test purpose',
  use_case: 'Test use case',
  version: '3.1'
};

test('titleCase capitalizes words split on dashes and underscores', () => {
  assert.equal(titleCase('deep-researcher'), 'Deep Researcher');
  assert.equal(titleCase('purpose-built'), 'Purpose Built');
  assert.equal(titleCase('MY_tool'), 'My Tool');
});

test('selectMetadataTemplate takes the first key contained in the document id', () => {
  const first: MetadataTemplate = { purpose: 'first', use_case: 'first', version: '1' };
  const second: MetadataTemplate = { purpose: 'second', use_case: 'second', version: '2' };
  const templates = { scratch: first, 'scratchpad-2': second };

  assert.equal(selectMetadataTemplate('scratchpad-2-x', 'core', templates), first);
  assert.equal(selectMetadataTemplate('pad-2', 'core', templates).purpose, 'Pad 2 framework for specialized AI reasoning');
});

test('selectMetadataTemplate builds a generic template from id and category', () => {
  assert.deepEqual(selectMetadataTemplate('novel-tool', 'purpose-built', {}), {
    purpose: 'Novel Tool framework for specialized AI reasoning',
    use_case: 'Purpose Built tasks requiring structured cognitive approach',
    version: '1.0'
  });
});

test('the bundled templates carry string versions', () => {
  assert.equal(selectMetadataTemplate('scratchpad-2.5-refined', 'core', DEFAULT_METADATA_TEMPLATES).version, '2.5');
  for (const template of Object.values(DEFAULT_METADATA_TEMPLATES)) {
    assert.equal(typeof template.version, 'string');
    assert.ok(template.purpose.length > 0);
    assert.ok(template.use_case.length > 0);
  }
});

test('applyMetadata fills only missing fields', () => {
  const document = { name: 'X', documentation: { purpose: 'Keep me' } };
  const result = applyMetadata(document, TEMPLATE, 'core');

  assert.deepEqual(result, {
    changed: true,
    fields: ['documentation.use_case', 'version', 'category'],
    document: {
      name: 'X',
      documentation: { purpose: 'Keep me', use_case: 'Test use case' },
      version: '3.1',
      category: 'core'
    }
  });
  assert.deepEqual(document, { name: 'X', documentation: { purpose: 'Keep me' } });
});

test('applyMetadata replaces blank values and starts empty documents from a mapping', () => {
  const blank = applyMetadata({ version: '  ', category: 'core', documentation: { purpose: '', use_case: 'Set' } }, TEMPLATE, 'core');
  assert.deepEqual(blank, {
    changed: true,
    fields: ['documentation.purpose', 'version'],
    document: {
      version: '3.1',
      category: 'core',
      documentation: { purpose: 'Test purpose', use_case: 'Set' }
    }
  });

  const empty = applyMetadata(undefined, TEMPLATE, 'personas');
  assert.deepEqual(empty, {
    changed: true,
    fields: ['documentation.purpose', 'documentation.use_case', 'version', 'category'],
    document: {
      version: '3.1',
      category: 'personas',
      documentation: { purpose: 'Test purpose', use_case: 'Test use case' }
    }
  });
});

test('applyMetadata leaves complete documents and non-mappings alone', () => {
  const complete = {
    version: '1.0',
    category: 'core',
    documentation: { purpose: 'P', use_case: 'U' }
  };
  assert.deepEqual(applyMetadata(complete, TEMPLATE, 'core'), { changed: false });
  assert.deepEqual(applyMetadata('scalar text', TEMPLATE, 'core'), { changed: false });
  assert.deepEqual(applyMetadata(['a'], TEMPLATE, 'core'), { changed: false });
});

test('addMetadataToFile writes the filled document with a start marker', async () => {
  await withTempCwd('metadata-file-', async (root) => {
    const filePath = await writeFixtureFile(
      root,
      'frameworks/core/scratchpad-2.5-refined.yml',
      '---\nname: Refined\nframework:\n  content: plain text'
    );

    const outcome = await addMetadataToFile(filePath, DEFAULT_METADATA_TEMPLATES, { check: false });
    assert.deepEqual(outcome, {
      filePath,
      status: 'updated',
      fields: ['documentation.purpose', 'documentation.use_case', 'version', 'category']
    });

    const written = await fs.readFile(filePath, 'utf8');
    assert.ok(written.startsWith('---\nname: Refined\n'));
    assert.ok(written.includes('\nversion: "2.5"\n'));
    assert.deepEqual(parseFrameworkYaml(written, filePath), {
      name: 'Refined',
      framework: { content: 'plain text' },
      version: '2.5',
      category: 'core',
      documentation: {
        purpose: 'Structured reasoning framework with comprehensive cognitive operations',
        use_case: 'Complex reasoning tasks requiring detailed analysis, synthesis, and metacognition'
      }
    });

    assert.deepEqual(await addMetadataToFile(filePath, DEFAULT_METADATA_TEMPLATES, { check: false }), {
      filePath,
      status: 'skipped'
    });
  });
});

test('addMetadataToFile handles empty files and check mode', async () => {
  await withTempCwd('metadata-empty-', async (root) => {
    const filePath = await writeRawFixtureFile(root, 'frameworks/personas/empty.yml', '');

    const checked = await addMetadataToFile(filePath, DEFAULT_METADATA_TEMPLATES, { check: true });
    assert.equal(checked.status, 'updated');
    assert.equal(await fs.readFile(filePath, 'utf8'), '');

    await addMetadataToFile(filePath, DEFAULT_METADATA_TEMPLATES, { check: false });
    assert.deepEqual(parseFrameworkYaml(await fs.readFile(filePath, 'utf8'), filePath), {
      version: '1.0',
      category: 'personas',
      documentation: {
        purpose: 'Empty framework for specialized AI reasoning',
        use_case: 'Personas tasks requiring structured cognitive approach'
      }
    });
  });
});

test('addMetadataToCorpus logs updates, skips and errors', async () => {
  await withTempCwd('metadata-corpus-', async (root) => {
    const files = [
      await writeFixtureFile(root, 'frameworks/core/alpha.yml', 'name: Alpha\nversion: "1.0"\ncategory: core\ndocumentation:\n  purpose: P\n  use_case: U'),
      await writeFixtureFile(root, 'frameworks/core/beta.yml', 'name: Beta\nversion: "2.0"\ncategory: core\ndocumentation:\n  purpose: P'),
      await writeFixtureFile(root, 'frameworks/core/gamma.yml', 'name: [unclosed')
    ];

    const { result, output } = await captureConsole(() =>
      addMetadataToCorpus(files, DEFAULT_METADATA_TEMPLATES, { check: false, quiet: false })
    );

    assert.deepEqual(result.updated, ['frameworks/core/beta.yml']);
    assert.deepEqual(result.skipped, ['frameworks/core/alpha.yml']);
    assert.equal(result.errors.length, 1);
    assert.deepEqual(output.logs, [
      'Skipped frameworks/core/alpha.yml (already complete)',
      'Updated frameworks/core/beta.yml (documentation.use_case)'
    ]);
    assert.match(output.errors[0], /^Error processing frameworks\/core\/gamma\.yml: invalid YAML/);
  });
});
