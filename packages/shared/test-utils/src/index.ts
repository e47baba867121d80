export { createTestSong } from './entity-factories';
export { buildMultipartBody, buildRawSampleFile, sequentialBytes } from './multipart-builders';
export type { MultipartPart, MultipartFieldPart, MultipartFilePart } from './multipart-builders';
export { createTempDir, removeTempDir } from './fs-helpers';
