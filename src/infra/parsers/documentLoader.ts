import { execFile } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import { promisify } from "node:util";
import { DocumentError } from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";

const execFileAsync = promisify(execFile);
const dynamicImport = new Function(
  "modulePath",
  "return import(modulePath)",
) as (modulePath: string) => Promise<unknown>;
const SUPPORTED_EXTENSIONS = new Set([".md", ".txt", ".pdf"]);

interface PdfParseResult {
  text?: string;
}

type PdfParseCtor = new (input: { data: Buffer }) => {
  getText: () => Promise<PdfParseResult>;
  destroy?: () => Promise<void> | void;
};

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function getSupportedDocumentExtensions(): string[] {
  return [...SUPPORTED_EXTENSIONS];
}

export async function loadDocumentText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();

  if (!SUPPORTED_EXTENSIONS.has(ext)) {
    throw new DocumentError(
      `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
    );
  }

  let text: string;
  if (ext === ".pdf") {
    text = await loadPdfText(filePath);
  } else {
    text = normalizeText(await fs.readFile(filePath, "utf-8"));
  }

  if (!text) {
    throw new DocumentError(`No extractable text in ${path.basename(filePath)}.`);
  }
  return text;
}

async function loadPdfText(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);

  const viaPdfParse = await tryParsePdfWithLibrary(buffer);
  if (viaPdfParse) {
    return viaPdfParse;
  }

  const viaPdftotext = await tryParsePdfWithPdftotext(filePath);
  if (viaPdftotext) {
    return viaPdftotext;
  }

  throw new DocumentError(
    "PDF parsing is unavailable. Install `pdf-parse` (`npm install pdf-parse`) or poppler's `pdftotext`.",
  );
}

async function tryParsePdfWithLibrary(buffer: Buffer): Promise<string | null> {
  let ctor: PdfParseCtor | null;
  try {
    ctor = resolvePdfParseCtor(await dynamicImport("pdf-parse"));
  } catch {
    return null;
  }
  if (!ctor) {
    return null;
  }

  const parser = new ctor({ data: buffer });
  try {
    const parsed = await parser.getText();
    return normalizeText(parsed.text ?? "") || null;
  } catch (error) {
    console.error(
      `pdf-parse could not read the file: ${error instanceof Error ? error.message : "unknown error"}`,
    );
    return null;
  } finally {
    if (typeof parser.destroy === "function") {
      await parser.destroy();
    }
  }
}

async function tryParsePdfWithPdftotext(filePath: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("pdftotext", ["-layout", filePath, "-"]);
    return normalizeText(stdout) || null;
  } catch {
    return null;
  }
}

function resolvePdfParseCtor(mod: unknown): PdfParseCtor | null {
  if (!mod || typeof mod !== "object") {
    return null;
  }

  const named = "PDFParse" in mod ? mod.PDFParse : undefined;
  if (typeof named === "function") {
    return named as PdfParseCtor;
  }

  return null;
}
