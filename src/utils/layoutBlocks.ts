/**
 * Layout helpers shared by the engines: turning recognized markdown into
 * positioned blocks and tables, keeping boxes inside the page, and
 * estimating column count from block positions.
 */

import type { BoundingBox, LayoutInfo, Table, TableRow, TextBlock, TextBlockType } from '../types';

export interface MarkdownStructure {
  blocks: TextBlock[];
  tables: Table[];
  layout: LayoutInfo;
}

const MARKDOWN_PAGE_WIDTH = 800;
const MARKDOWN_MIN_PAGE_HEIGHT = 1000;
const LINE_HEIGHT = 20;
const LINE_ADVANCE = 25;
const BLANK_ADVANCE = 20;
const CHAR_WIDTH = 8;

// Histogram resolution for column detection
const COLUMN_BINS = 50;

function isSeparatorRow(line: string): boolean {
  return /^[\s|:\-]+$/.test(line) && line.includes('-');
}

function classifyLine(line: string): TextBlockType {
  if (line.startsWith('#')) return 'heading';
  if (line.startsWith('|') && line.endsWith('|')) return 'table_row';
  if (line.startsWith('$$') || line.endsWith('$$')) return 'math';
  return 'paragraph';
}

function splitPipeRow(line: string): string[] {
  let cells = line.split('|').map(c => c.trim());
  if (cells[0] === '') cells = cells.slice(1);
  if (cells[cells.length - 1] === '') cells = cells.slice(0, -1);
  return cells;
}

function unionBoxes(boxes: BoundingBox[]): BoundingBox {
  const minX = Math.min(...boxes.map(b => b.x));
  const minY = Math.min(...boxes.map(b => b.y));
  const maxX = Math.max(...boxes.map(b => b.x + b.width));
  const maxY = Math.max(...boxes.map(b => b.y + b.height));
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

function buildTable(rowBlocks: TextBlock[], confidence: number): Table | null {
  const dataRows = rowBlocks.filter(block => !isSeparatorRow(block.text));
  if (dataRows.length === 0) return null;

  const grid = dataRows.map(block => splitPipeRow(block.text));
  const columnCount = Math.max(...grid.map(r => r.length));
  if (columnCount === 0) return null;

  const boundingBox = unionBoxes(dataRows.map(b => b.boundingBox));
  const cellWidth = Math.floor(boundingBox.width / columnCount);

  const rows: TableRow[] = grid.map((cells, rowIndex) => {
    const rowBox = dataRows[rowIndex].boundingBox;
    return {
      cells: cells.map((text, columnIndex) => ({
        text,
        rowIndex,
        columnIndex,
        columnSpan: 1,
        rowSpan: 1,
        boundingBox: {
          x: boundingBox.x + columnIndex * cellWidth,
          y: rowBox.y,
          width: cellWidth,
          height: rowBox.height,
        },
      })),
    };
  });

  return { rows, boundingBox, confidence };
}

/**
 * Lay markdown out top to bottom on a virtual page: one block per non-empty
 * line, pipe-table runs collected into tables. The page grows to fit
 * every block.
 */
export function markdownToStructure(markdown: string, confidence: number): MarkdownStructure {
  const blocks: TextBlock[] = [];
  const tables: Table[] = [];
  let tableRun: TextBlock[] = [];
  let y = 0;

  const flushTable = () => {
    if (tableRun.length > 0) {
      const table = buildTable(tableRun, confidence);
      if (table) tables.push(table);
      tableRun = [];
    }
  };

  for (const rawLine of markdown.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      flushTable();
      y += BLANK_ADVANCE;
      continue;
    }

    const block: TextBlock = {
      text: line,
      confidence,
      blockType: classifyLine(line),
      boundingBox: {
        x: 0,
        y,
        width: Math.min(line.length * CHAR_WIDTH, MARKDOWN_PAGE_WIDTH),
        height: LINE_HEIGHT,
      },
    };
    blocks.push(block);

    if (block.blockType === 'table_row') {
      tableRun.push(block);
    } else {
      flushTable();
    }
    y += LINE_ADVANCE;
  }
  flushTable();

  const contentBottom = blocks.reduce((max, b) => Math.max(max, b.boundingBox.y + b.boundingBox.height), 0);
  const pageHeight = Math.max(MARKDOWN_MIN_PAGE_HEIGHT, contentBottom);

  return {
    blocks,
    tables,
    layout: {
      pageWidth: MARKDOWN_PAGE_WIDTH,
      pageHeight,
      orientation: 'portrait',
      columnCount: 1,
      hasTables: tables.length > 0,
      hasDiagrams: markdown.includes('$$'),
    },
  };
}

/**
 * Clip a box to the page so that x + width <= pageWidth and
 * y + height <= pageHeight.
 */
export function clampBox(box: BoundingBox, pageWidth: number, pageHeight: number): BoundingBox {
  const x = Math.min(Math.max(0, box.x), Math.max(0, pageWidth - 1));
  const y = Math.min(Math.max(0, box.y), Math.max(0, pageHeight - 1));
  return {
    x,
    y,
    width: Math.max(0, Math.min(box.width, pageWidth - x)),
    height: Math.max(0, Math.min(box.height, pageHeight - y)),
  };
}

export function boxWithinPage(box: BoundingBox, pageWidth: number, pageHeight: number): boolean {
  return (
    box.x >= 0 &&
    box.y >= 0 &&
    box.width >= 0 &&
    box.height >= 0 &&
    box.x + box.width <= pageWidth &&
    box.y + box.height <= pageHeight &&
    box.x < pageWidth &&
    box.y < pageHeight
  );
}

/**
 * Count text columns by looking for empty vertical bands in a horizontal
 * coverage histogram of the blocks.
 */
export function estimateColumnCount(blocks: TextBlock[], pageWidth: number): number {
  if (blocks.length < 2 || pageWidth <= 0) return 1;

  const binWidth = pageWidth / COLUMN_BINS;
  const histogram = new Array<number>(COLUMN_BINS).fill(0);
  for (const { boundingBox } of blocks) {
    const startBin = Math.max(0, Math.floor(boundingBox.x / binWidth));
    const endBin = Math.min(COLUMN_BINS - 1, Math.floor((boundingBox.x + boundingBox.width) / binWidth));
    for (let i = startBin; i <= endBin; i++) histogram[i]++;
  }

  const firstUsed = histogram.findIndex(count => count > 0);
  const lastUsed = COLUMN_BINS - 1 - [...histogram].reverse().findIndex(count => count > 0);
  if (firstUsed < 0) return 1;

  // Gaps narrower than 3% of the page are word spacing, not gutters
  const minGapBins = Math.max(1, Math.ceil(COLUMN_BINS * 0.03));
  let columns = 1;
  let gapLength = 0;
  for (let i = firstUsed; i <= lastUsed; i++) {
    if (histogram[i] === 0) {
      gapLength++;
    } else {
      if (gapLength >= minGapBins) columns++;
      gapLength = 0;
    }
  }
  return columns;
}
