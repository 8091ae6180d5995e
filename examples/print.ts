import type { Tally, WeightedSampler } from "../src/index";

/* ────────────────────────────── Constants ────────────────────────────── */

const FULL = "█";
const PARTIAL = ["", "▏", "▎", "▍", "▌", "▋", "▊", "▉"]; // 1/8 … 7/8

const B = {
  tl: "┌",
  tr: "┐",
  bl: "└",
  br: "┘",
  mm: "┼",
  bm: "┴",
  ml: "├",
  mr: "┤",
  h: "─",
  v: "│",
} as const;

type Align = "left" | "right";

const termWidth = () => process.stdout.columns ?? 80;
const clamp01 = (n: number) => Math.max(0, Math.min(1, n));

/* ───────────────────────────── Print Helpers ───────────────────────────── */

export function sep(title: string) {
  console.log(`\n===== ${title} =====\n`);
}

export function pct(x: number) {
  return `${(x * 100).toFixed(2)}%`;
}

/* ───────────────────────────── Box & Tables ───────────────────────────── */

/** Generic N-column divider: e.g. ├──┼──┼──┤ */
function dividerN(
  widths: number[],
  left: string = B.ml,
  mid: string = B.mm,
  right: string = B.mr
): string {
  const seg = (w: number) => B.h.repeat(w + 2); // +2 for cell padding
  return left + widths.map(seg).join(mid) + right;
}

function padCell(text: string, width: number, align: Align) {
  return (
    " " + (align === "right" ? text.padStart(width) : text.padEnd(width)) + " "
  );
}

function rowN(cells: string[], widths: number[], aligns: Align[]) {
  const body = cells
    .map((c, i) => padCell(c, widths[i], aligns[i] ?? "left"))
    .join(B.v);
  return `${B.v}${body}${B.v}`;
}

/** Table with a title tab on top instead of a box around the whole table. */
function buildTableWithTab(
  title: string,
  headers: string[],
  dataRows: string[][],
  aligns: Align[]
): string[] {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...dataRows.map((row) => (row[i] ?? "").length))
  );

  const tabText = ` ${title} `;
  const tabWidth = Math.max(12, tabText.length);
  const totalTableWidth =
    widths.reduce((sum, w) => sum + w + 2, 0) + widths.length + 1;

  const lines: string[] = [];
  lines.push(B.tl + B.h.repeat(tabWidth) + B.tr);
  lines.push(B.v + tabText.padEnd(tabWidth, " ") + B.v);

  // ├[tab]┴[rest]┐
  const remainingWidth = Math.max(0, totalTableWidth - tabWidth - 3);
  lines.push(B.ml + B.h.repeat(tabWidth) + B.bm + B.h.repeat(remainingWidth) + B.tr);

  lines.push(rowN(headers, widths, aligns));
  lines.push(dividerN(widths));
  for (const row of dataRows) {
    lines.push(rowN(row, widths, aligns));
  }
  lines.push(dividerN(widths, B.bl, B.bm, B.br));
  return lines;
}

export function printTableWithTab(
  title: string,
  headers: string[],
  dataRows: string[][],
  aligns: Align[]
): void {
  buildTableWithTab(title, headers, dataRows, aligns).forEach((line) =>
    console.log(line)
  );
  console.log("");
}

/* ───────────────────────────── Bar Charts ───────────────────────────── */

function renderBar(fraction: number, width: number): string {
  const total = clamp01(fraction) * width;
  const full = Math.floor(total);
  const rem = total - full;
  // show a sliver when nonzero remainder exists
  const partialIndex =
    rem === 0 ? 0 : Math.max(1, Math.min(7, Math.floor(rem * 8)));
  return (FULL.repeat(full) + PARTIAL[partialIndex]).padEnd(width, " ");
}

/* ───────────────────────────── Sampler Output ───────────────────────────── */

/** Probability mass per distinct outcome; duplicates are merged. */
function expectedShares(sampler: WeightedSampler): Map<number, number> {
  const shares = new Map<number, number>();
  const probabilities = sampler.probabilities;
  sampler.outcomes.forEach((outcome, i) => {
    shares.set(outcome, (shares.get(outcome) ?? 0) + Number(probabilities[i]));
  });
  return shares;
}

export function printSummary(sampler: WeightedSampler): void {
  sep("Sampler");
  console.log(`Numbers: [${sampler.outcomes.join(", ")}]`);
  console.log(`Probabilities: [${sampler.probabilities.join(", ")}]`);
  console.log(`Cumulative: [${sampler.cumulativeDecimals.join(", ")}]`);
}

export function printFrequencyTable(
  sampler: WeightedSampler,
  counts: Tally,
  draws: number
): void {
  const shares = expectedShares(sampler);
  const rows = Array.from(counts, ([outcome, count]) => {
    const share = shares.get(outcome) ?? 0;
    return [
      String(outcome),
      String(Math.round(share * draws)),
      String(count),
      pct(draws === 0 ? 0 : count / draws),
      pct(share),
    ];
  });

  printTableWithTab(
    `${draws} draws`,
    ["NUMBER", "EXPECTED", "ACTUAL", "ACTUAL %", "TARGET %"],
    rows,
    ["left", "right", "right", "right", "right"]
  );
}

export function printFrequencyChart(counts: Tally, draws: number): void {
  const rows = Array.from(counts);
  if (rows.length === 0 || draws === 0) {
    console.log("<no data>");
    return;
  }

  const labelWidth = Math.max(...rows.map(([o]) => String(o).length));
  const barWidth = Math.max(1, termWidth() - labelWidth - 14);
  const maxCount = Math.max(...rows.map(([, c]) => c)) || 1;

  for (const [outcome, count] of rows) {
    const label = String(outcome).padStart(labelWidth);
    const bar = renderBar(count / maxCount, barWidth);
    console.log(` ${label}: ${bar} ${pct(count / draws).padStart(7)}`);
  }
  console.log("");
}
