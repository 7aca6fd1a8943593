export { createDeck, DECK_SIZE } from "./presets";
export { cardToString, findCardInHand, formatHand } from "./card-names";
export { dealCards, drawFromFront, type DealResult } from "./deal";
