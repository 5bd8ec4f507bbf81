export function stripBom(text: string): string {
  return text.replace(/^\uFEFF/, "");
}

/** Quote-aware split; `""` inside quotes is a literal quote. */
export function splitCsvRows(csv: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let currentField = "";
  let currentRow: string[] = [];
  let inQuotes = false;

  for (let i = 0; i < csv.length; i += 1) {
    const char = csv[i];

    if (char === '"') {
      if (inQuotes && csv[i + 1] === '"') {
        currentField += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      currentRow.push(currentField);
      currentField = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && csv[i + 1] === "\n") i += 1;
      currentRow.push(currentField);
      rows.push(currentRow);
      currentRow = [];
      currentField = "";
      continue;
    }

    currentField += char;
  }

  currentRow.push(currentField);
  rows.push(currentRow);
  return rows;
}

export function detectDelimiter(headerLine: string): string {
  // Fluvius exports use ';'; fall back to ',' when ';' does not split the header.
  return headerLine.split(";").length > 1 ? ";" : ",";
}

/** Index of the first candidate header present (case-insensitive), or -1. */
export function findHeader(header: string[], candidates: string[]): number {
  const lowered = header.map((h) => h.trim().toLowerCase());
  for (const candidate of candidates) {
    const idx = lowered.indexOf(candidate);
    if (idx !== -1) return idx;
  }
  return -1;
}
