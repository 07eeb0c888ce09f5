export type {
  InstrumentName,
  PriceValue,
  DecimalNumber,
  DateTime,
} from './primitives.js';
export type {
  PriceBucket,
  PriceStatus,
  QuoteHomeConversionFactors,
  PriceUpdate,
  Heartbeat,
  StreamEvent,
  StreamEventType,
} from './pricing.js';
export type {
  StreamRequest,
  StreamState,
  DroppedFrame,
  CloseReason,
  ClosedOutcome,
  FailedOutcome,
  StreamOutcome,
} from './stream.js';
