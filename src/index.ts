export { StreamClient, stopStream, createStreamClientFromEnv } from './client.js';
export type { StreamClientOptions, OpenPricingStreamOptions } from './client.js';
export { PriceStreamSession } from './stream/session.js';
export type { StreamSessionOptions } from './stream/session.js';
export { JsonFrameDecoder } from './stream/frame-decoder.js';
export type { Frame } from './stream/frame-decoder.js';
export { DeliveryChannel } from './stream/delivery-channel.js';
export { OnceClosingSource, fromReadable } from './stream/frame-source.js';
export type { FrameSource } from './stream/frame-source.js';
export { classifyFrame, materializeEvent, readDiscriminator } from './stream/dispatcher.js';
export { createStreamRequest, toStreamQuery } from './pricing/stream-request.js';
export type { StreamRequestInput } from './pricing/stream-request.js';
export { parseDateTime, isZeroTime, ZERO_DATE_TIME } from './pricing/date-time.js';
export {
  STREAM_BASE_LIVE,
  STREAM_BASE_PRACTICE,
  pricingStreamPath,
  type OandaEnvironment,
} from './exchange/oanda/endpoints.js';
export {
  ConfigurationError,
  TransportError,
  HttpError,
  BadRequestError,
  UnauthorizedError,
  ForbiddenError,
  NotFoundError,
  MethodNotAllowedError,
  FrameDecodeError,
} from './errors.js';
export type * from './types/index.js';
