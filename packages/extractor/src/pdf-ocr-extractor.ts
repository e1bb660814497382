import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ExtractionError, errorMessage } from "@docrag/errors";
import type { IExtractor } from "./extractor.interface.js";
import { runCommand, type CommandRunner } from "./command-runner.js";

const PAGE_PREFIX = "page";
// pdftoppm pads the page number to the width of the page count: page-01.png
const PAGE_FILE = /^page-(\d+)\.png$/;

export interface PdfOcrOptions {
  tesseractCmd?: string;
  pdftoppmCmd?: string;
  /** Rasterization resolution. Default: 300 */
  dpi?: number;
  /** OCR language passed to tesseract. Default: eng */
  language?: string;
  run?: CommandRunner;
}

/**
 * Scanned or digital PDFs alike are rasterized page by page with poppler's
 * pdftoppm and read back with tesseract. Each page's text is followed by a
 * newline, in page order.
 */
export class PdfOcrExtractor implements IExtractor<"pdf"> {
  readonly type = "pdf";
  private tesseractCmd: string;
  private pdftoppmCmd: string;
  private dpi: number;
  private language: string;
  private run: CommandRunner;

  constructor(options: PdfOcrOptions = {}) {
    this.tesseractCmd = options.tesseractCmd ?? "/usr/bin/tesseract";
    this.pdftoppmCmd = options.pdftoppmCmd ?? "pdftoppm";
    this.dpi = options.dpi ?? 300;
    this.language = options.language ?? "eng";
    this.run = options.run ?? runCommand;
  }

  async extract(input: Uint8Array): Promise<string> {
    const workDir = await mkdtemp(join(tmpdir(), "docrag-pdf-"));

    try {
      const pdfPath = join(workDir, "input.pdf");
      await writeFile(pdfPath, input);

      const pages = await this.rasterize(pdfPath, workDir);
      let text = "";
      for (const page of pages) {
        text += (await this.recognize(page)) + "\n";
      }
      return text;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async rasterize(pdfPath: string, workDir: string): Promise<string[]> {
    try {
      await this.run(this.pdftoppmCmd, [
        "-r",
        String(this.dpi),
        "-png",
        pdfPath,
        join(workDir, PAGE_PREFIX),
      ]);
    } catch (err) {
      throw new ExtractionError(`PDF rasterization failed: ${errorMessage(err)}`, { cause: err });
    }

    const pages = (await readdir(workDir))
      .map((name) => ({ name, match: PAGE_FILE.exec(name) }))
      .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
      .map((entry) => ({ path: join(workDir, entry.name), number: Number(entry.match[1]) }))
      .sort((a, b) => a.number - b.number);

    if (pages.length === 0) {
      throw new ExtractionError("PDF rasterization produced no pages");
    }

    return pages.map((page) => page.path);
  }

  private async recognize(imagePath: string): Promise<string> {
    try {
      // "stdout" as the output base makes tesseract print the text
      const { stdout } = await this.run(this.tesseractCmd, [
        imagePath,
        "stdout",
        "-l",
        this.language,
      ]);
      return stdout;
    } catch (err) {
      throw new ExtractionError(`OCR failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
