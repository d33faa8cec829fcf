export type Orientation = 'w' | 'b';
export type GlyphSet = 'unicode' | 'ascii';
export type MoveNotation = 'san' | 'uci';

export type ConsoleSetup = {
  /** Which side is drawn at the bottom. */
  orientation: Orientation;
  glyphs: GlyphSet;
  /** Notation used when echoing played moves and listing legal moves. */
  notation: MoveNotation;
  /** Starting position; null means the standard one. */
  fen: string | null;
};

export const DEFAULT_CONSOLE_SETUP: ConsoleSetup = {
  orientation: 'w',
  glyphs: 'unicode',
  notation: 'san',
  fen: null
};

export type SetupParseResult =
  | { ok: true; value: ConsoleSetup }
  | { ok: false; error: string };

export function parseOrientationParam(param: string | null): Orientation | null {
  if (param === 'w' || param === 'white') return 'w';
  if (param === 'b' || param === 'black') return 'b';
  return null;
}

export function parseGlyphsParam(param: string | null): GlyphSet | null {
  if (param === 'unicode' || param === 'ascii') return param;
  return null;
}

export function parseNotationParam(param: string | null): MoveNotation | null {
  if (param === 'san' || param === 'uci') return param;
  return null;
}

export const USAGE = [
  'Usage: chess-console [options]',
  '  --orientation <white|black>  side shown at the bottom (default white)',
  '  --glyphs <unicode|ascii>     piece symbols (default unicode)',
  '  --ascii                      same as --glyphs ascii',
  '  --notation <san|uci>         notation for echoed moves (default san)',
  '  --fen "<fen>"                start from a FEN position'
].join('\n');

/**
 * Parses command-line options. Both `--name value` and `--name=value` are accepted.
 */
export function parseConsoleArgs(argv: readonly string[]): SetupParseResult {
  const setup: ConsoleSetup = { ...DEFAULT_CONSOLE_SETUP };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--ascii') {
      setup.glyphs = 'ascii';
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    let value: string | null = eq >= 0 ? arg.slice(eq + 1) : null;
    if (value === null && i + 1 < argv.length) {
      value = argv[i + 1];
      i++;
    }

    switch (name) {
      case '--orientation': {
        const o = parseOrientationParam(value);
        if (!o) return { ok: false, error: `Invalid --orientation: ${value ?? '(missing)'}` };
        setup.orientation = o;
        break;
      }
      case '--glyphs': {
        const g = parseGlyphsParam(value);
        if (!g) return { ok: false, error: `Invalid --glyphs: ${value ?? '(missing)'}` };
        setup.glyphs = g;
        break;
      }
      case '--notation': {
        const n = parseNotationParam(value);
        if (!n) return { ok: false, error: `Invalid --notation: ${value ?? '(missing)'}` };
        setup.notation = n;
        break;
      }
      case '--fen':
        if (!value) return { ok: false, error: 'Missing value for --fen' };
        setup.fen = value;
        break;
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, value: setup };
}
