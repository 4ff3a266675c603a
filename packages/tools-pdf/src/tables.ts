import { z } from 'zod';

/** Rows × cells. `null` marks a column of the table with no text in that row. */
export type Table = (string | null)[][];

/** One line of text on a page and its box, in PDF points from the top-left corner. */
export interface LayoutLine {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

// Subset of MuPDF's structured-text JSON (`StructuredText.asJSON()`) that table detection reads.
const BoxSchema = z.object({ x: z.number(), y: z.number(), w: z.number(), h: z.number() });
const LineSchema = z.object({ bbox: BoxSchema, text: z.string().default('') });
const BlockSchema = z.object({ type: z.string(), lines: z.array(LineSchema).optional() });
const StructuredTextSchema = z.object({ blocks: z.array(BlockSchema) });

/** Rows farther apart than this many row heights start a new table. */
const MAX_ROW_GAP = 2;

export interface Row {
  top: number;
  bottom: number;
  centre: number;
  cells: LayoutLine[];
}

interface Column {
  start: number;
  end: number;
}

/**
 * Reads the text lines out of a page's structured-text JSON.
 * @throws If the JSON is malformed or not shaped like MuPDF's output.
 */
export function parseLayoutLines(json: string): LayoutLine[] {
  const parsed = StructuredTextSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid structure';
    throw new Error(`Unrecognised page layout: ${detail}`);
  }
  return parsed.data.blocks.flatMap((block) =>
    (block.lines ?? []).map((line) => ({
      text: line.text,
      x: line.bbox.x,
      y: line.bbox.y,
      width: line.bbox.w,
      height: line.bbox.h,
    })),
  );
}

/** Groups lines whose vertical centres line up into rows, top to bottom, cells left to right. */
export function groupRows(lines: LayoutLine[]): Row[] {
  const centreOf = (line: LayoutLine) => line.y + line.height / 2;
  const sorted = lines
    .filter((line) => line.text.trim() !== '')
    .sort((a, b) => centreOf(a) - centreOf(b) || a.x - b.x);

  const rows: Row[] = [];
  for (const line of sorted) {
    const centre = centreOf(line);
    const row = rows[rows.length - 1];
    if (row && Math.abs(centre - row.centre) <= Math.min(line.height, row.bottom - row.top) / 2) {
      row.cells.push(line);
      row.top = Math.min(row.top, line.y);
      row.bottom = Math.max(row.bottom, line.y + line.height);
    } else {
      rows.push({ top: line.y, bottom: line.y + line.height, centre, cells: [line] });
    }
  }
  for (const row of rows) {
    row.cells.sort((a, b) => a.x - b.x);
  }
  return rows;
}

/** Splits rows into runs of consecutive multi-cell rows that sit close together. */
function candidateRuns(rows: Row[]): Row[][] {
  const runs: Row[][] = [];
  let current: Row[] = [];
  const flush = () => {
    if (current.length >= 2) runs.push(current);
    current = [];
  };

  for (const row of rows) {
    if (row.cells.length < 2) {
      flush();
      continue;
    }
    const previous = current[current.length - 1];
    if (previous) {
      const gap = row.top - previous.bottom;
      const height = Math.max(previous.bottom - previous.top, row.bottom - row.top);
      if (gap > MAX_ROW_GAP * height) flush();
    }
    current.push(row);
  }
  flush();
  return runs;
}

/** Merges the horizontal extents of every cell into non-overlapping columns. */
function columnsOf(rows: Row[]): Column[] {
  const extents = rows
    .flatMap((row) => row.cells)
    .map((cell) => ({ start: cell.x, end: cell.x + cell.width }))
    .sort((a, b) => a.start - b.start);

  const columns: Column[] = [];
  for (const extent of extents) {
    const last = columns[columns.length - 1];
    if (last && extent.start <= last.end) {
      last.end = Math.max(last.end, extent.end);
    } else {
      columns.push({ ...extent });
    }
  }
  return columns;
}

function toTable(rows: Row[], columns: Column[]): Table {
  return rows.map((row) => {
    const cells: (string | null)[] = columns.map(() => null);
    for (const cell of row.cells) {
      const centre = cell.x + cell.width / 2;
      const index = columns.findIndex((column) => centre >= column.start && centre <= column.end);
      if (index === -1) continue;
      const text = cell.text.trim();
      const existing = cells[index];
      cells[index] = existing ? `${existing} ${text}` : text;
    }
    return cells;
  });
}

/**
 * Finds tables among a page's text lines: runs of at least two aligned rows that
 * each hold two or more cells, laid out on a grid of at least two columns.
 */
export function detectTables(lines: LayoutLine[]): Table[] {
  const tables: Table[] = [];
  for (const run of candidateRuns(groupRows(lines))) {
    const columns = columnsOf(run);
    if (columns.length < 2) continue;
    tables.push(toTable(run, columns));
  }
  return tables;
}
