export { ValidationError, TransportError } from '@/domain/errors';
export type { ValidationCode, TransportErrorCode } from '@/domain/errors';
export type { ColorSample, CompiledSegment, CompiledSequence, Rgb, Segment } from '@/domain/sequence/types';
export { splitSegments, splitDuration } from '@/domain/sequence/segmentSplitter';
export { deriveHeaderFields } from '@/domain/sequence/headerFields';
export { encodeSequence, validateCompiledSequence } from '@/domain/sequence/sequenceCodec';
export { buildSegments, compileSequence, parseSequenceDocument } from '@/domain/sequence/sequenceDocument';
export type { CompileOptions, SequenceDocument } from '@/domain/sequence/sequenceDocument';
export { decodeIpv4UdpFrame } from '@/domain/protocol/ipv4Frame';
export { parseBeacon } from '@/domain/protocol/beacon';
export type { DeviceRecord, DeviceSnapshot, PlaybackSession } from '@/domain/device/types';
export { DeviceDiscovery } from '@/application/discovery/deviceDiscovery';
export type { DeviceDiscoveryOptions, ProbeResult } from '@/application/discovery/deviceDiscovery';
export { SequenceUploader } from '@/application/upload/sequenceUploader';
export type { UploadRequest, UploadResult } from '@/application/upload/sequenceUploader';
export { PlaybackController, initialPlaybackSession } from '@/application/playback/playbackController';
export type { PlayResult, StopResult } from '@/application/playback/playbackController';
export { ColorCommander } from '@/application/control/colorCommander';
export type { CommandResult } from '@/application/control/colorCommander';
export { SequenceCompiler } from '@/application/compile/sequenceCompiler';
export { UdpBeaconSource } from '@/adapters/network/udpBeaconSource';
export { FrameBeaconSource } from '@/adapters/network/frameBeaconSource';
export { UdpDatagramTransport } from '@/adapters/network/udpDatagramTransport';
export type { BeaconSource, InboundDatagram, RawFrameFeed } from '@/ports/BeaconSource';
export { createRuntime } from '@/runtime/bootstrap';
export type { Runtime, RuntimeOptions, RuntimeServices } from '@/runtime/bootstrap';
