export {
  standardDeck,
  rankValue,
  cardKey,
  formatCard,
  sameCard,
  isRank,
  isSuit,
} from "./cards";
export { RANKS, SUITS } from "@war-audit/schema";
