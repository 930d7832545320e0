export { LineClassifier, classify, renderLine, type LineClassifierOptions } from "./line-classifier";
export { CardGroupDeck, DeckConsistencyTracker, standardDeckSeeds, type DeckSeed, type TrackerResult } from "./deck-tracker";
export { TrickComparer, type TrickResolution, type FaceUpResult } from "./trick-comparer";
export { ProtocolStateMachine, ONGOING_RULES, CLOSING_RULES, INITIAL_PROTOCOL_STATE, type TransitionRule, type TransitionResult } from "./protocol-machine";
export { TranscriptValidator, ValidatorReuseError, validateTranscript, type TranscriptValidatorOptions, type ValidationProgress } from "./transcript-validator";
