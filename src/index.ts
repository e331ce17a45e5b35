export { createNoteLinkCore } from './NoteLinkCore.js';
export type { NoteLinkCore, NoteLinkCoreOverrides } from './NoteLinkCore.js';
export { loadConfig } from './config/ConfigLoader.js';
export type { NoteLinkConfig, PartialConfig } from './config/types.js';

export type { NoteRecord, NoteType } from './domain/entities/NoteRecord.js';
export type { LinkReference, LinkType } from './domain/entities/LinkReference.js';
export type {
  ApplyResult,
  RenameChange,
  RenameDecision,
  RenameOutcome,
  RenameOutcomeStatus,
} from './domain/entities/RenameChange.js';
export { RenameTransaction } from './domain/entities/RenameTransaction.js';
export type { RenameState } from './domain/entities/RenameTransaction.js';
export * from './domain/errors/DomainErrors.js';

export type { NotesFsPort } from './domain/ports/NotesFsPort.js';
export type { DirectoryScanner, ScanFilter, ScanListing } from './domain/ports/DirectoryScanner.js';
export type { ContentSearcher, ContentMatch, ContentSearchOptions } from './domain/ports/ContentSearcher.js';
export type { NotificationPort, NotificationLevel } from './domain/ports/NotificationPort.js';

export { NoteIndex } from './application/NoteIndex.js';
export { LinkResolver } from './application/LinkResolver.js';
export type { Resolution, ResolutionStrategy } from './application/LinkResolver.js';
export { BacklinkUseCase } from './application/BacklinkUseCase.js';
export type { ResolvedBacklink, BacklinkGroup } from './application/BacklinkUseCase.js';
export { RenameUseCase } from './application/RenameUseCase.js';
export type { RenameComputation, RenamePreview } from './application/RenameUseCase.js';
export { LinkExtractor } from './infrastructure/notes/LinkExtractor.js';
export { Logger } from './shared/Logger.js';
