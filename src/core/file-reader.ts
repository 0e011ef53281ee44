import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { CheckError } from "../errors";

const DOMAIN_COLUMN_NAMES = ["domain", "fqdn", "host", "hostname", "whitelisted domains"];

/**
 * Read trusted domains from a CSV or XLSX allowlist.
 * With no matching header every row is data, read from the column holding
 * the most domain-like cells (a ranked `rank,domain` list reads column 1).
 * Entries are lower-cased and deduplicated in file order.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the domain column.
 */
export function readDomainsFromFile(filePath: string, columnName?: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new CheckError("ConfigError", `Allowlist file "${filePath}" does not exist.`);
  }

  const ext = path.extname(filePath).toLowerCase();
  let rows: string[][];
  if (ext === ".csv" || ext === ".txt") {
    rows = readCsvRows(filePath);
  } else if (ext === ".xlsx" || ext === ".xls") {
    rows = readXlsxRows(filePath);
  } else {
    throw new CheckError(
      "ConfigError",
      `Unsupported allowlist type "${ext}". Only .csv, .txt and .xlsx/.xls are supported.`
    );
  }

  if (rows.length === 0) return [];

  const colIdx = findDomainColumn(rows[0], columnName);
  const dataRows = colIdx === null ? rows : rows.slice(1);
  const idx = colIdx ?? guessDomainColumn(dataRows);

  const seen = new Set<string>();
  const domains: string[] = [];
  for (const row of dataRows) {
    const cell = (row[idx] ?? "").trim().toLowerCase();
    if (!looksLikeDomain(cell) || seen.has(cell)) continue;
    seen.add(cell);
    domains.push(cell);
  }
  return domains;
}

// ── Internals ────────────────────────────────────────────────────────────────

/** Header index of the domain column, or null when the first row is data. */
function findDomainColumn(headers: string[], preferred?: string): number | null {
  const normalized = headers.map((h) => h.trim().toLowerCase());

  if (preferred) {
    const idx = normalized.indexOf(preferred.trim().toLowerCase());
    if (idx === -1) {
      throw new CheckError(
        "ConfigError",
        `Column "${preferred}" not found.\n` +
          `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  for (const name of DOMAIN_COLUMN_NAMES) {
    const idx = normalized.indexOf(name);
    if (idx !== -1) return idx;
  }
  return null;
}

function looksLikeDomain(cell: string): boolean {
  return cell.includes(".") && !/^[\d.]+$/.test(cell);
}

/** Column with the most domain-like cells; the leftmost wins a tie. */
function guessDomainColumn(rows: string[][]): number {
  const width = Math.max(...rows.map((r) => r.length));
  let best = 0;
  let bestCount = 0;
  for (let col = 0; col < width; col++) {
    const count = rows.filter((r) => looksLikeDomain((r[col] ?? "").trim())).length;
    if (count > bestCount) {
      best = col;
      bestCount = count;
    }
  }
  return best;
}

/** Minimal CSV row parser: handles quoted fields and "" escaped quotes. */
function parseCsvRow(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

function readCsvRows(filePath: string): string[][] {
  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  return content
    .split(/\r?\n/)
    .filter((l) => l.trim() !== "")
    .map(parseCsvRow);
}

function readXlsxRows(filePath: string): string[][] {
  const wb = XLSX.readFile(filePath);
  const sheetName = wb.SheetNames[0];
  if (!sheetName) return [];
  const ws = wb.Sheets[sheetName];

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 });
  return rows.map((row) => row.map((cell) => String(cell ?? "")));
}
