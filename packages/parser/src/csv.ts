import Papa from "papaparse";

function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|").trim();
}

/** First row becomes the header. Short rows are padded. */
export function rowsToMarkdownTable(rows: string[][]): string {
  const [header, ...body] = rows;
  if (!header) return "";

  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const pad = (row: string[]) => [...row, ...Array<string>(width - row.length).fill("")].map(escapeCell);

  const head = pad(header);
  return [
    `| ${head.join(" | ")} |`,
    `|${head.map((cell) => "-".repeat(Math.max(3, cell.length + 2))).join("|")}|`,
    ...body.map((row) => `| ${pad(row).join(" | ")} |`),
  ].join("\n");
}

/** Quoted cells may hold commas and line breaks; a line break becomes a space. */
export function csvToMarkdownTable(input: string): string {
  const parsed = Papa.parse<string[]>(input, { delimiter: ",", skipEmptyLines: "greedy" });
  return rowsToMarkdownTable(parsed.data);
}
