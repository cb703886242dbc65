/**
 * Layout Block Unit Tests
 *
 * Tests markdown-to-block layout, pipe table extraction, box clamping, and
 * column estimation.
 */

import type { TextBlock } from '../src/types';
import { boxWithinPage, clampBox, estimateColumnCount, markdownToStructure } from '../src/utils/layoutBlocks';
import { banner, finish, section, test } from './support/harness';

banner('LAYOUT BLOCK TESTS');

// Test 1: Markdown structure
section('Markdown structure');

const markdown = ['# Title', '', '| a | b |', '|---|---|', '| 1 | 2 |', '', '$$x^2$$'].join('\n');
const structure = markdownToStructure(markdown, 0.95);

test(
  'Each non-empty line becomes a typed block',
  structure.blocks.map(b => b.blockType).join(',') === 'heading,table_row,table_row,table_row,math',
  structure.blocks.map(b => b.blockType).join(',')
);
test(
  'Blocks advance down the page',
  structure.blocks.map(b => b.boundingBox.y).join(',') === '0,45,70,95,140',
  structure.blocks.map(b => b.boundingBox.y).join(',')
);
test('Block width follows line length', structure.blocks[0].boundingBox.width === 56);
test('Blocks carry the confidence', structure.blocks.every(b => b.confidence === 0.95));

test('One table is found', structure.tables.length === 1);
const table = structure.tables[0];
test('Separator row is not a table row', table.rows.length === 2);
test(
  'Cells are split on pipes',
  table.rows.map(r => r.cells.map(c => c.text).join('/')).join(';') === 'a/b;1/2'
);
test(
  'Table box spans its data rows',
  JSON.stringify(table.boundingBox) === '{"x":0,"y":45,"width":72,"height":70}',
  JSON.stringify(table.boundingBox)
);
test(
  'Cell geometry',
  JSON.stringify(table.rows[1].cells[1].boundingBox) === '{"x":36,"y":95,"width":36,"height":20}',
  JSON.stringify(table.rows[1].cells[1].boundingBox)
);
test('Cell indices', table.rows[1].cells[1].rowIndex === 1 && table.rows[1].cells[1].columnIndex === 1);

test('Layout flags tables and formulas', structure.layout.hasTables && structure.layout.hasDiagrams);
test('Short content keeps the minimum page height', structure.layout.pageHeight === 1000);
test(
  'Every block lies within the page',
  structure.blocks.every(b => boxWithinPage(b.boundingBox, structure.layout.pageWidth, structure.layout.pageHeight))
);

const long = markdownToStructure(Array.from({ length: 60 }, (_, i) => `Line ${i}`).join('\n'), 0.5);
test('Page grows to fit long content', long.layout.pageHeight === 59 * 25 + 20, `${long.layout.pageHeight}`);

const wide = markdownToStructure('x'.repeat(500), 0.5);
test('Wide lines are capped at the page width', wide.blocks[0].boundingBox.width === 800);

const empty = markdownToStructure('', 0.5);
test('Empty markdown has no blocks', empty.blocks.length === 0 && empty.tables.length === 0 && !empty.layout.hasTables);

// Test 2: Box clamping
section('Box clamping');

test(
  'Box inside the page is unchanged',
  JSON.stringify(clampBox({ x: 10, y: 10, width: 20, height: 20 }, 100, 100)) === '{"x":10,"y":10,"width":20,"height":20}'
);
test(
  'Overflow is trimmed',
  JSON.stringify(clampBox({ x: 90, y: 95, width: 50, height: 50 }, 100, 100)) === '{"x":90,"y":95,"width":10,"height":5}'
);
test(
  'Negative origin is moved onto the page',
  JSON.stringify(clampBox({ x: -5, y: -5, width: 10, height: 10 }, 100, 100)) === '{"x":0,"y":0,"width":10,"height":10}'
);
test('Clamped boxes lie within the page', boxWithinPage(clampBox({ x: 500, y: 500, width: 9, height: 9 }, 100, 100), 100, 100));
test('boxWithinPage rejects overflow', !boxWithinPage({ x: 90, y: 0, width: 20, height: 10 }, 100, 100));

// Test 3: Column estimation
section('Column estimation');

function block(x: number, width: number): TextBlock {
  return { text: 't', confidence: 1, blockType: 'paragraph', boundingBox: { x, y: 0, width, height: 10 } };
}

test('Single block is one column', estimateColumnCount([block(0, 100)], 1000) === 1);
test('Overlapping blocks are one column', estimateColumnCount([block(0, 500), block(400, 500)], 1000) === 1);
test('Two separated bands are two columns', estimateColumnCount([block(0, 400), block(600, 400)], 1000) === 2);
test(
  'Three separated bands are three columns',
  estimateColumnCount([block(0, 250), block(350, 250), block(700, 250)], 1000) === 3
);

finish();
