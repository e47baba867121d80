export * from './ByteRange';
export * from './WavTranscoder';
export * from './MediaStreamer';
