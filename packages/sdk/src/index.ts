// public api for @conduit/sdk
// usage:
//   import { PhaseDescriptor, phaseSucceeded, ToolFailure } from '@conduit/sdk';
//   const fetchMetadata: PhaseHandler<Artifacts> = async (ctx) => { ... };

export * from './phases';
export * from './types';
export * from './errors';
export * from './result';
export { serialize, deserialize, SerializationError, MAX_STATE_BYTES } from './utils/serialization';
