const STANDARD_COLORS = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white"] as const;

const BRIGHT_COLORS = [
  "brightBlack",
  "brightRed",
  "brightGreen",
  "brightYellow",
  "brightBlue",
  "brightMagenta",
  "brightCyan",
  "brightWhite",
] as const;

export type AnsiColor = (typeof STANDARD_COLORS)[number] | (typeof BRIGHT_COLORS)[number];

/** RGB values a renderer can use for each named colour. */
export const ANSI_PALETTE: Record<AnsiColor, string> = {
  black: "#000000",
  red: "#cd3131",
  green: "#0dbc79",
  yellow: "#e5e510",
  blue: "#2472c8",
  magenta: "#bc3fbc",
  cyan: "#11a8cd",
  white: "#e5e5e5",
  brightBlack: "#666666",
  brightRed: "#f14c4c",
  brightGreen: "#23d18b",
  brightYellow: "#f5f543",
  brightBlue: "#3b8eea",
  brightMagenta: "#d670d6",
  brightCyan: "#29b8db",
  brightWhite: "#ffffff",
};

export type AnsiSegment = {
  text: string;
  color: AnsiColor | null;
  bold: boolean;
};

export type LineFormat = "raw" | "plain" | "segments";

export type RenderedLines =
  | { format: "raw" | "plain"; lines: string[] }
  | { format: "segments"; lines: AnsiSegment[][] };

type Style = {
  color: AnsiColor | null;
  bold: boolean;
};

type ControlSequence = {
  params: string;
  final: number | null;
  end: number;
};

const ESC = 0x1b;
const C1_CSI = 0x9b;
const C1_ST = 0x9c;
const BEL = 0x07;
const LEFT_BRACKET = 0x5b;
const RIGHT_BRACKET = 0x5d;
const BACKSLASH = 0x5c;
const SGR_FINAL = 0x6d;

const PLAIN_STYLE: Style = { color: null, bold: false };

function isParameterByte(code: number): boolean {
  return code >= 0x30 && code <= 0x3f;
}

function isIntermediateByte(code: number): boolean {
  return code >= 0x20 && code <= 0x2f;
}

function isFinalByte(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

/**
 * Reads a CSI body starting right after its introducer. A character outside the
 * CSI byte ranges aborts the sequence; `end` then points at that character so the
 * caller treats it as ordinary text.
 */
function readControlSequence(text: string, from: number): ControlSequence {
  let params = "";
  let index = from;

  while (index < text.length) {
    const code = text.charCodeAt(index);

    if (isParameterByte(code)) {
      params += text[index];
      index += 1;
    } else if (isIntermediateByte(code)) {
      index += 1;
    } else if (isFinalByte(code)) {
      return { params, final: code, end: index + 1 };
    } else {
      return { params, final: null, end: index };
    }
  }

  return { params, final: null, end: text.length };
}

/** OSC payloads end with BEL or ST; an unterminated one runs to the end of input. */
function skipOperatingSystemCommand(text: string, from: number): number {
  for (let index = from; index < text.length; index += 1) {
    const code = text.charCodeAt(index);

    if (code === BEL || code === C1_ST) {
      return index + 1;
    }

    if (code === ESC && text.charCodeAt(index + 1) === BACKSLASH) {
      return index + 2;
    }
  }

  return text.length;
}

/**
 * Skips the intermediate bytes of an escape such as `ESC ( B` and the final
 * byte that ends it. Without a final byte only the intermediates go.
 */
function skipIntermediateEscape(text: string, from: number): number {
  let index = from;
  while (index < text.length && isIntermediateByte(text.charCodeAt(index))) {
    index += 1;
  }

  const final = text.charCodeAt(index);
  return final >= 0x30 && final <= 0x7e ? index + 1 : index;
}

/**
 * Removes terminal escape sequences, keeping every other character. Only ASCII
 * code units are ever consumed, so surrogate pairs are never split.
 */
export function strip(text: string): string {
  let out = "";
  let runStart = 0;
  let index = 0;

  while (index < text.length) {
    const code = text.charCodeAt(index);

    if (code !== ESC && code !== C1_CSI) {
      index += 1;
      continue;
    }

    out += text.slice(runStart, index);

    if (code === C1_CSI) {
      index = readControlSequence(text, index + 1).end;
    } else {
      const next = text.charCodeAt(index + 1);

      if (next === LEFT_BRACKET) {
        index = readControlSequence(text, index + 2).end;
      } else if (next === RIGHT_BRACKET) {
        index = skipOperatingSystemCommand(text, index + 2);
      } else if (isIntermediateByte(next)) {
        index = skipIntermediateEscape(text, index + 1);
      } else if (next >= 0x30 && next <= 0x7e) {
        index += 2;
      } else {
        index += 1;
      }
    }

    runStart = index;
  }

  return out + text.slice(runStart);
}

function colorForCode(code: number): AnsiColor | undefined {
  if (code >= 30 && code <= 37) {
    return STANDARD_COLORS[code - 30];
  }

  if (code >= 90 && code <= 97) {
    return BRIGHT_COLORS[code - 90];
  }

  return undefined;
}

function applySgr(style: Style, params: string): Style {
  const codes = params.split(";").map((part) => {
    const trimmed = part.trim();
    if (trimmed.length === 0) {
      return 0;
    }
    return /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  });

  let next: Style = { ...style };

  for (let index = 0; index < codes.length; index += 1) {
    const code = codes[index];

    if (code === 0) {
      next = { ...PLAIN_STYLE };
    } else if (code === 1) {
      next.bold = true;
    } else if (code === 22) {
      next.bold = false;
    } else if (code === 39) {
      next.color = null;
    } else if (code === 38 || code === 48) {
      // extended colours carry their own arguments: 5;n or 2;r;g;b
      const mode = codes[index + 1];
      if (mode === 5) {
        index += 2;
      } else if (mode === 2) {
        index += 4;
      }
    } else {
      const color = colorForCode(code);
      if (color) {
        next.color = color;
      }
    }
  }

  return next;
}

/**
 * Splits a line into styled segments using its SGR sequences. Other control
 * sequences are consumed without effect; an ESC that does not open a CSI stays
 * in the text as a literal character.
 */
export function parse(text: string): AnsiSegment[] {
  const segments: AnsiSegment[] = [];
  let style: Style = { ...PLAIN_STYLE };
  let pending = "";
  let runStart = 0;
  let index = 0;

  const flush = (): void => {
    if (pending.length > 0) {
      segments.push({ text: pending, color: style.color, bold: style.bold });
      pending = "";
    }
  };

  while (index < text.length) {
    const code = text.charCodeAt(index);

    let bodyStart: number;
    if (code === C1_CSI) {
      bodyStart = index + 1;
    } else if (code === ESC && text.charCodeAt(index + 1) === LEFT_BRACKET) {
      bodyStart = index + 2;
    } else {
      index += 1;
      continue;
    }

    pending += text.slice(runStart, index);

    const sequence = readControlSequence(text, bodyStart);
    if (sequence.final === SGR_FINAL) {
      flush();
      style = applySgr(style, sequence.params);
    }

    index = sequence.end;
    runStart = index;
  }

  pending += text.slice(runStart);
  flush();

  return segments;
}

export function renderLines(lines: readonly string[], format: LineFormat): RenderedLines {
  if (format === "segments") {
    return { format, lines: lines.map((line) => parse(line)) };
  }

  if (format === "plain") {
    return { format, lines: lines.map((line) => strip(line)) };
  }

  return { format, lines: [...lines] };
}
