export * from './types/ids.js';
export * from './types/enums.js';
export * from './types/error.js';
export * from './types/line.js';
export * from './types/equality.js';
export * from './types/align.js';
export * from './types/diff.js';
export * from './types/operations.js';
export * from './types/commands.js';
export * from './types/collaborators.js';
export * from './types/sink.js';

export { splitLines, joinLines, linesFrom, textsOf, dominantEol } from './text/lines.js';
export { DEFAULT_EQUALITY, resolveEquality, compileEquality } from './equality/policy.js';
export { DefaultAligner } from './align/DefaultAligner.js';
export { makePin, makeCut, checkSplits } from './align/splits.js';
export { DifferenceIndex } from './diff/DifferenceIndex.js';
export { classify } from './diff/classify.js';
export { MergeOperator } from './merge/MergeOperator.js';
export type { MergeContext } from './merge/MergeOperator.js';
export { invert } from './ops/operations.js';
export { UndoStack } from './document/UndoStack.js';
export { Document, DEFAULT_DOCUMENT_OPTIONS, NOOP_DOCUMENT_SINK } from './document/Document.js';
export type { DocumentOptions, PendingRealign } from './document/Document.js';
export { Workspace } from './document/Workspace.js';
export type { Tab } from './document/Workspace.js';
export { textSource } from './collab/sources.js';
export { mapCollaboratorError, callCollaborator } from './collab/errorMapper.js';
export { makeError } from './utils/errors.js';
