/**
 * Catalog Service Use Cases
 */

export * from './ListSongsUseCase';
export * from './PickRandomSongUseCase';
export * from './UploadSongUseCase';
export * from './DeleteSongUseCase';
export * from './ResolveStreamUseCase';
