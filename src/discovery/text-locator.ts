import { OperationTimeoutError, TextRecognitionError } from "../errors.js";
import type { Box, Frame } from "../types.js";
import { ExecError, execWithInput } from "../utils/exec.js";
import { clipRegion, encodeFramePng } from "../utils/image.js";

export interface TextSpan {
  text: string;
  /** Frame pixel coordinates. */
  box: Box;
  /** 0..1 */
  confidence: number;
}

/**
 * Recognizes text in a frame. Implementations are deterministic for
 * identical pixels and never retry; callers own the retry budget.
 */
export interface TextLocator {
  locate(frame: Frame, region?: Box): Promise<TextSpan[]>;
}

export interface TesseractOptions {
  binary: string;
  timeoutMs: number;
  languages?: string[];
}

/**
 * Text locator backed by the tesseract CLI. The frame (or region) is piped
 * in as PNG and word boxes are read from the TSV report.
 */
export class TesseractTextLocator implements TextLocator {
  constructor(private readonly options: TesseractOptions) {}

  async locate(frame: Frame, region?: Box): Promise<TextSpan[]> {
    const clipped = region ? clipRegion(frame, region) : undefined;
    if (region && !clipped) return [];

    const png = await encodeFramePng(frame, clipped);
    const lang = this.options.languages?.length
      ? ` -l ${this.options.languages.join("+")}`
      : "";
    // psm 11: sparse text, camera UIs have scattered short labels
    const command = `${this.options.binary} stdin stdout --psm 11${lang} tsv`;

    let tsv: string;
    try {
      tsv = await execWithInput(command, png, { timeout: this.options.timeoutMs });
    } catch (error) {
      if (error instanceof ExecError && error.timedOut) {
        throw new OperationTimeoutError("tesseract", { cause: error });
      }
      const detail =
        error instanceof ExecError
          ? error.detail
          : error instanceof Error
            ? error.message
            : String(error);
      throw new TextRecognitionError(`tesseract failed: ${detail}`, { cause: error });
    }

    const offsetX = clipped?.x ?? 0;
    const offsetY = clipped?.y ?? 0;
    return parseTesseractTsv(tsv).map((span) => ({
      ...span,
      box: { ...span.box, x: span.box.x + offsetX, y: span.box.y + offsetY },
    }));
  }
}

interface TsvWord {
  lineKey: string;
  text: string;
  box: Box;
  confidence: number;
}

/**
 * Parses tesseract's TSV output into spans: one per recognized word, plus
 * one per line of two or more words (box = union, confidence = weakest
 * word) so multi-word labels can match.
 */
export function parseTesseractTsv(tsv: string): TextSpan[] {
  const words: TsvWord[] = [];

  for (const line of tsv.split("\n").slice(1)) {
    const cols = line.replace(/\r$/, "").split("\t");
    if (cols.length < 12) continue;

    const level = parseInt(cols[0], 10);
    const conf = parseFloat(cols[10]);
    const text = cols.slice(11).join("\t").trim();
    // level 5 = word; conf -1 marks layout rows without text
    if (level !== 5 || conf < 0 || !text) continue;

    words.push({
      lineKey: cols.slice(1, 5).join(":"), // page:block:par:line
      text,
      box: {
        x: parseInt(cols[6], 10),
        y: parseInt(cols[7], 10),
        width: parseInt(cols[8], 10),
        height: parseInt(cols[9], 10),
      },
      confidence: conf / 100,
    });
  }

  const spans: TextSpan[] = words.map(({ text, box, confidence }) => ({
    text,
    box,
    confidence,
  }));

  const lines = new Map<string, TsvWord[]>();
  for (const word of words) {
    const group = lines.get(word.lineKey);
    if (group) {
      group.push(word);
    } else {
      lines.set(word.lineKey, [word]);
    }
  }

  for (const group of lines.values()) {
    if (group.length < 2) continue;
    spans.push({
      text: group.map((w) => w.text).join(" "),
      box: unionBox(group.map((w) => w.box)),
      confidence: Math.min(...group.map((w) => w.confidence)),
    });
  }

  return spans;
}

function unionBox(boxes: Box[]): Box {
  const left = Math.min(...boxes.map((b) => b.x));
  const top = Math.min(...boxes.map((b) => b.y));
  const right = Math.max(...boxes.map((b) => b.x + b.width));
  const bottom = Math.max(...boxes.map((b) => b.y + b.height));
  return { x: left, y: top, width: right - left, height: bottom - top };
}
