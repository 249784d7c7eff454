import type { Address, Byte } from '../emulator/types';

// Register operands are 0..15 by construction (one nibble of the opcode).
type X = { x: number };
type XY = { x: number; y: number };
type XKK = { x: number; kk: Byte };
type NNN = { nnn: Address };

export type Instruction =
  | { kind: 'Noop'; nnn: Address }                      // 0NNN (machine-code call, not supported)
  | { kind: 'ClearScreen' }                             // 00E0
  | { kind: 'ReturnFromSubroutine' }                    // 00EE
  | ({ kind: 'Jump' } & NNN)                            // 1NNN
  | ({ kind: 'CallSubroutine' } & NNN)                  // 2NNN
  | ({ kind: 'SkipIfXEqualsKK' } & XKK)                 // 3XKK
  | ({ kind: 'SkipIfXNotEqualsKK' } & XKK)              // 4XKK
  | ({ kind: 'SkipIfXEqualsY' } & XY)                   // 5XY0
  | ({ kind: 'LoadX' } & XKK)                           // 6XKK
  | ({ kind: 'AddToX' } & XKK)                          // 7XKK
  | ({ kind: 'LoadYIntoX' } & XY)                       // 8XY0
  | ({ kind: 'OrXY' } & XY)                             // 8XY1
  | ({ kind: 'AndXY' } & XY)                            // 8XY2
  | ({ kind: 'XorXY' } & XY)                            // 8XY3
  | ({ kind: 'AddYToX' } & XY)                          // 8XY4
  | ({ kind: 'SubYFromX' } & XY)                        // 8XY5
  | ({ kind: 'ShiftRight' } & XY)                       // 8XY6
  | ({ kind: 'SubXFromY' } & XY)                        // 8XY7
  | ({ kind: 'ShiftLeft' } & XY)                        // 8XYE
  | ({ kind: 'SkipIfXNotEqualsY' } & XY)                // 9XY0
  | ({ kind: 'SetIndex' } & NNN)                        // ANNN
  | ({ kind: 'JumpPlusV0' } & X & NNN)                  // BNNN (x feeds the 'vx' jump quirk)
  | ({ kind: 'SetRandom' } & XKK)                       // CXKK
  | { kind: 'Display'; x: number; y: number; n: number } // DXYN
  | ({ kind: 'SkipIfPressed' } & X)                     // EX9E
  | ({ kind: 'SkipIfNotPressed' } & X)                  // EXA1
  | ({ kind: 'SetXToDelayTimer' } & X)                  // FX07
  | ({ kind: 'WaitForKeyPressed' } & X)                 // FX0A
  | ({ kind: 'SetDelayTimerToX' } & X)                  // FX15
  | ({ kind: 'SetSoundTimerToX' } & X)                  // FX18
  | ({ kind: 'AddXToI' } & X)                           // FX1E
  | ({ kind: 'SetIToSpriteX' } & X)                     // FX29
  | ({ kind: 'LoadBCDOfX' } & X)                        // FX33
  | ({ kind: 'Write0ThroughX' } & X)                    // FX55
  | ({ kind: 'Load0ThroughX' } & X);                    // FX65
