/**
 * Command Line Argument Unit Tests
 *
 * Tests argument parsing and the engine choice `convert` hands to the
 * converter.
 */

import { convertArgs, flagString, parseArgs } from '../src/cliArgs';
import { buildEngineRegistry, loadConfig } from '../src/config';
import { MOCK_ENGINE_NAME } from '../src/services/mockEngine';
import { PdfConverter } from '../src/services/pdfConverter';
import { EngineUnavailableError } from '../src/utils/errors';
import { banner, captureError, describe, finish, section, test } from './support/harness';
import { MemoryDocumentSource } from './support/fakes';
import { THREE_PAGE_SIZES, buildPdf } from './support/pdfFixtures';

banner('COMMAND LINE ARGUMENT TESTS');

// Test 1: Parsing
section('Parsing');

const parsed = parseArgs(['convert', 'three.pdf', '--out', 'build', '--json']);
test('Command comes first', parsed.command === 'convert');
test('Positional arguments are kept', parsed.positional.join(',') === 'three.pdf');
test('Valued flag', flagString(parsed, 'out') === 'build');
test('Bare flag', parsed.flags.get('json') === true && flagString(parsed, 'json') === undefined);
test('No arguments means help', parseArgs([]).command === 'help');

const plain = convertArgs(parseArgs(['convert', 'three.pdf']));
test('Output directory defaults to output', plain.outDir === 'output' && !plain.json);
test('No --engine leaves the engine unset', plain.engineName === undefined);
test(
  '--engine is passed through',
  convertArgs(parseArgs(['convert', 'three.pdf', '--engine', 'tesseract'])).engineName === 'tesseract'
);

// Test 2: Engine choice without credentials
section('Engine choice without credentials');

const source = new MemoryDocumentSource({ 'three.pdf': buildPdf(THREE_PAGE_SIZES) });
const registry = buildEngineRegistry(loadConfig({}));

{
  const { documentId = '', engineName } = plain;
  const converter = new PdfConverter({ source, registry, engineName });
  const error = await captureError(() => converter.convert(documentId));
  test(
    'Default convert reports the missing remote engine',
    error instanceof EngineUnavailableError && error.code === 'ENGINE_UNAVAILABLE',
    describe(error)
  );
}

{
  const { documentId = '', engineName } = convertArgs(parseArgs(['convert', 'three.pdf', '--engine', MOCK_ENGINE_NAME]));
  const converter = new PdfConverter({ source, registry, engineName });
  const result = await converter.convert(documentId);
  test('Explicit --engine uses the named engine', result.engineUsed === MOCK_ENGINE_NAME && result.pageImages.length === 3);
}

finish();
