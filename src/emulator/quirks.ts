// Behavioral differences between historical CHIP-8 interpreters.
// All-default is the classic interpreter behavior the CPU documents.

export type IndexIncrement = 'none' | 'x' | 'x+1';
export type JumpOffset = 'v0' | 'v0-low-nibble' | 'vx';

export interface Quirks {
  shiftFromVy: boolean;          // 8XY6/8XYE: Vx <- Vy shifted, instead of Vx shifted in place
  indexIncrement: IndexIncrement; // FX55/FX65: how far I advances afterwards
  wrapSprites: boolean;          // DXYN: pixels past the edge wrap instead of clipping
  jumpOffset: JumpOffset;        // BNNN: offset register
  vblankWait: boolean;           // DXYN: at most one draw per frame
  logicResetsVF: boolean;        // 8XY1/8XY2/8XY3: VF <- 0 afterwards
}

export const DEFAULT_QUIRKS: Readonly<Quirks> = {
  shiftFromVy: false,
  indexIncrement: 'none',
  wrapSprites: false,
  jumpOffset: 'v0',
  vblankWait: false,
  logicResetsVF: false,
};

export type QuirkPreset = 'classic' | 'cosmac' | 'schip';

export const QUIRK_PRESETS: Record<QuirkPreset, Readonly<Quirks>> = {
  classic: DEFAULT_QUIRKS,
  cosmac: {
    shiftFromVy: true,
    indexIncrement: 'x+1',
    wrapSprites: false,
    jumpOffset: 'v0',
    vblankWait: true,
    logicResetsVF: true,
  },
  schip: {
    shiftFromVy: false,
    indexIncrement: 'none',
    wrapSprites: false,
    jumpOffset: 'vx',
    vblankWait: false,
    logicResetsVF: false,
  },
};

export function resolveQuirks(overrides: Partial<Quirks> = {}): Quirks {
  return { ...DEFAULT_QUIRKS, ...overrides };
}

function isPreset(name: string): name is QuirkPreset {
  return name === 'classic' || name === 'cosmac' || name === 'schip';
}

function isIndexIncrement(v: string): v is IndexIncrement {
  return v === 'none' || v === 'x' || v === 'x+1';
}

function isJumpOffset(v: string): v is JumpOffset {
  return v === 'v0' || v === 'v0-low-nibble' || v === 'vx';
}

// Parses e.g. "cosmac", "shift,wrap", "schip,index=x+1", "jump=v0-low-nibble".
// Tokens apply left to right; unknown tokens are returned so callers can report them.
export function parseQuirks(text: string): { quirks: Quirks; unknown: string[] } {
  const quirks = resolveQuirks();
  const unknown: string[] = [];
  for (const raw of text.split(',')) {
    const token = raw.trim().toLowerCase();
    if (!token) continue;
    const eq = token.indexOf('=');
    const key = eq >= 0 ? token.slice(0, eq) : token;
    const value = eq >= 0 ? token.slice(eq + 1) : undefined;
    if (value === undefined && isPreset(key)) {
      Object.assign(quirks, QUIRK_PRESETS[key]);
      continue;
    }
    const off = value === '0' || value === 'false' || value === 'off';
    switch (key) {
      case 'shift': quirks.shiftFromVy = !off; break;
      case 'wrap': quirks.wrapSprites = !off; break;
      case 'vblank': quirks.vblankWait = !off; break;
      case 'logic': quirks.logicResetsVF = !off; break;
      case 'index':
      case 'memory': {
        const v = value ?? 'x+1';
        if (isIndexIncrement(v)) quirks.indexIncrement = v; else unknown.push(raw.trim());
        break;
      }
      case 'jump': {
        const v = value ?? 'vx';
        if (isJumpOffset(v)) quirks.jumpOffset = v; else unknown.push(raw.trim());
        break;
      }
      default:
        unknown.push(raw.trim());
    }
  }
  return { quirks, unknown };
}
