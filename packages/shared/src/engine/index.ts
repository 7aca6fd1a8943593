export { createInitialState, applyAction, replayGame, type GameOptions } from "./interpreter";
export { isValidPlay, validateAction, ERROR_MESSAGES, type ActionValidationResult } from "./play-validator";
export { resolveSpecialCard, DRAW_PENALTIES, type SpecialEffectResolution } from "./special-effects";
export { parseCommand, parseColorChoice, type ParseCommandResult, type ColorChoiceResult } from "./command-parser";
export { SeededRng, createRng, hashSeed } from "./prng";
