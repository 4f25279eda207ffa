export {
  Verifier,
  VerificationResponseSchema,
  UNSUPPORTED_ANSWER,
  type VerificationResponse,
  type VerificationReport,
  type VerifyInput,
  type VerifierOptions,
  type LlmCheck,
} from './verifier.js';

export {
  EvidenceSet,
  DEFAULT_TOLERANCE,
  extractFigures,
  extractNumbers,
  numbersMatch,
  splitSentences,
  type Figure,
  type StrippedText,
} from './evidence.js';
