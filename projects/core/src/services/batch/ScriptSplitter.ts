/**
 * Splits a script into ordered segments for batch generation.
 */

export const SPLITTER_KINDS = ["paragraphs", "lines", "markers"] as const;
export type SplitterKind = (typeof SPLITTER_KINDS)[number];

/**
 * A piece of script before it is numbered.
 */
export interface SegmentDraft {
  readonly text: string;
  /** Marker name from a `[MARKER]` header, as written */
  readonly marker?: string;
}

export interface ScriptSegment {
  /** 1-based position in the script */
  readonly index: number;
  /** Also the output file's base name, e.g. "003-intro" or "segment-003" */
  readonly segmentId: string;
  readonly marker?: string;
  readonly text: string;
}

export type ScriptSplitterFn = (script: string) => readonly SegmentDraft[];

const MARKER_LINE = /^\s*\[([A-Za-z0-9][A-Za-z0-9 _-]*)\]\s*(.*)$/;

function collapseWhitespace(text: string): string {
  return text.replace(/\s*\n\s*/g, " ").trim();
}

export function splitParagraphs(script: string): SegmentDraft[] {
  return script
    .split(/\r?\n\s*\r?\n/)
    .map(collapseWhitespace)
    .filter((text) => text.length > 0)
    .map((text) => ({ text }));
}

export function splitLines(script: string): SegmentDraft[] {
  return script
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((text) => ({ text }));
}

/**
 * `[NAME]` headers start a segment; the text up to the next header belongs to it.
 * Text before the first header becomes an unmarked segment. Headers with no
 * text are dropped.
 */
export function splitMarkers(script: string): SegmentDraft[] {
  const drafts: SegmentDraft[] = [];
  let marker: string | undefined;
  let lines: string[] = [];

  const flush = (): void => {
    const text = collapseWhitespace(lines.join("\n"));
    if (text.length > 0) {
      drafts.push(marker !== undefined ? { text, marker } : { text });
    }
    lines = [];
  };

  for (const line of script.split(/\r?\n/)) {
    const match = MARKER_LINE.exec(line);
    if (match) {
      flush();
      marker = match[1]?.trim();
      const rest = match[2] ?? "";
      if (rest.trim().length > 0) {
        lines.push(rest);
      }
    } else {
      lines.push(line);
    }
  }
  flush();

  return drafts;
}

const SPLITTERS: Readonly<Record<SplitterKind, ScriptSplitterFn>> = {
  paragraphs: splitParagraphs,
  lines: splitLines,
  markers: splitMarkers,
};

export function resolveSplitter(splitter: SplitterKind | ScriptSplitterFn): ScriptSplitterFn {
  return typeof splitter === "function" ? splitter : SPLITTERS[splitter];
}

export function segmentFileStem(index: number, marker?: string): string {
  const number = String(index).padStart(3, "0");
  if (marker === undefined) {
    return `segment-${number}`;
  }
  const slug = marker
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug.length > 0 ? `${number}-${slug}` : `segment-${number}`;
}

/**
 * Numbers drafts in order. Empty drafts are kept so the caller can report them.
 */
export function toSegments(drafts: readonly SegmentDraft[]): ScriptSegment[] {
  return drafts.map((draft, position) => {
    const index = position + 1;
    return {
      index,
      segmentId: segmentFileStem(index, draft.marker),
      ...(draft.marker !== undefined ? { marker: draft.marker } : {}),
      text: draft.text,
    };
  });
}
