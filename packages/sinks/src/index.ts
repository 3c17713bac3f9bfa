export type { BatchDelivery, BatchSink, Sink, StreamSink } from './types'
export { encodeArtifact, encodeCsv, encodeJson, type EncodedArtifact } from './encode'
export {
  MessageBusSink,
  createPubSubPublisher,
  type MessagePublisher,
} from './message-bus-sink'
export {
  ObjectStoreSink,
  createGcsClient,
  type ObjectStoreClient,
  type ObjectStoreSinkOptions,
} from './object-store-sink'
export { LocalDiskSink, type LocalDiskSinkOptions } from './local-disk-sink'
export {
  startArtifactServer,
  type ArtifactServerHandle,
  type ArtifactServerOptions,
} from './artifact-server'
export { createSinkFactory, type SinkFactory } from './factory'
