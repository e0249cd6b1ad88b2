/** @casefile-audit/core - Validated audit associations for matters, documents and revisions */

// Associations - Models
export type {
  AssociationDefinition,
  AssociationInfo,
  AssociationModel,
  BatchConversionOptions,
  ConversionOptions,
} from './associations/define.js';
export { defineAssociation } from './associations/define.js';
export type { DocumentActivityUserModel } from './associations/document-activity.js';
export { documentActivityUsers } from './associations/document-activity.js';
export type { MatterActivityUserModel } from './associations/matter-activity.js';
export { matterActivityUsers } from './associations/matter-activity.js';
export type { RevisionActivityUserModel } from './associations/revision-activity.js';
export { revisionActivityUsers } from './associations/revision-activity.js';
export type { TransferFromModel, TransferToModel } from './associations/transfer.js';
export { transfersFrom, transfersTo } from './associations/transfer.js';
// Associations - Relations
export type { RelationBinding, RelationSpec } from './associations/relations.js';
export { activityRelation, bindRelation, userRelation } from './associations/relations.js';
// Associations - Classification
export type { DocumentActivityCategory } from './associations/classification.js';
export {
  activityNameOf,
  ageInDays,
  documentActivityCategory,
  isArchival,
  isCheckIn,
  isCheckOut,
  isCopy,
  isCreation,
  isDeletion,
  isLifecycleChange,
  isMove,
  isRecent,
  isRestoration,
  isSave,
  isTransfer,
  isUnarchival,
  isVersionControl,
  isViewing,
} from './associations/classification.js';
// Associations - Display
export type { DisplayBinding, DisplayPlaceholders, MissingPlaceholder } from './associations/display.js';
export {
  auditMessageOf,
  describeAssociation,
  formatAuditTimestamp,
  resolvePlaceholders,
  summarizeAssociation,
} from './associations/display.js';
// Associations - Ordering
export {
  associationEquals,
  associationHashCode,
  associationKeyIds,
  compareAssociations,
  isSameOperation,
  sortAssociations,
} from './associations/ordering.js';
// Associations - Transfers
export type {
  ReconcileOptions,
  TransferComplianceIssue,
  TransferIssueKind,
  TransferPair,
  TransferReconciliation,
} from './associations/reconcile.js';
export { findTransferComplianceIssues, reconcileTransfers } from './associations/reconcile.js';
// Config
export { resolveValidationOptions } from './config.js';
export type {
  Clock,
  ReservedWordSets,
  ReservedWordsConfig,
  ResolvedValidationOptions,
  ValidationOptions,
  ValidationOptionsInput,
} from './config.types.js';
// Constants
export type {
  ActivityKind,
  DocumentActivityName,
  MatterActivityName,
  RevisionActivityName,
  TransferActivityName,
} from './constants.js';
export {
  ACTIVITY_KIND,
  ACTIVITY_NAMES,
  DEFAULTS,
  FILE_LIMITS,
  NIL_ID,
  SEEDED_ACTIVITY_IDS,
  TEXT_LIMITS,
} from './constants.js';
// Domain - Association Types
export type {
  AssociationInputBase,
  AssociationKind,
  AuditAssociation,
  DocumentActivityInput,
  DocumentActivityUser,
  DocumentActivityUserEntity,
  MatterActivityInput,
  MatterActivityUser,
  MatterActivityUserEntity,
  MatterDocumentTransfer,
  RevisionActivityInput,
  RevisionActivityUser,
  RevisionActivityUserEntity,
  TransferDirection,
  TransferEntity,
  TransferFrom,
  TransferInput,
  TransferSubject,
  TransferTo,
} from './domain/association-types.js';
// Domain - Branded Types
export type { ActivityId, AnyBrandedId, DocumentId, MatterId, RevisionId, UserId } from './domain/branded-types.js';
export {
  canonicalizeId,
  createActivityId,
  createDocumentId,
  createMatterId,
  createRevisionId,
  createUserId,
  IdValidationError,
  isActivityId,
  isBlankId,
  isDocumentId,
  isMatterId,
  isNilId,
  isPresentId,
  isRevisionId,
  isUserId,
  sameId,
  unwrapId,
} from './domain/branded-types.js';
// Domain - Entity Types
export type {
  ActivityEntity,
  ActivityRecord,
  DocumentEntity,
  DocumentInput,
  DocumentRecord,
  EntityConversionOptions,
  MatterEntity,
  MatterInput,
  MatterRecord,
  RevisionEntity,
  RevisionInput,
  RevisionRecord,
  UserEntity,
  UserRecord,
} from './domain/entity-types.js';
// Domain - Result
export type { Result, Violation, ViolationKind } from './domain/result.js';
export {
  failure,
  fromViolations,
  ModelValidationError,
  prefixViolations,
  referentialViolation,
  success,
  summarizeViolations,
  violation,
} from './domain/result.js';
// Entities
export {
  activityFromEntity,
  activityRecordEquals,
  activityRecordHashCode,
  createActivityRecord,
  isActivityRecordValid,
  seededActivity,
  validateActivityRecord,
} from './entities/activity.js';
export {
  createDocument,
  describeDocument,
  documentEquals,
  documentFromEntity,
  documentHashCode,
  documentState,
  fullFileName,
  isDocumentValid,
  normalizeExtension,
  validateDocument,
} from './entities/document.js';
export type { EntityValidationOptions } from './entities/identity.js';
export { equalsByIdentity, hashByIdentity } from './entities/identity.js';
export type { MatterStatus } from './entities/matter.js';
export {
  createMatter,
  describeMatter,
  isMatterValid,
  matterEquals,
  matterFromEntity,
  matterHashCode,
  matterState,
  matterStatus,
  validateMatter,
  validateMatterUniqueness,
} from './entities/matter.js';
export {
  createRevision,
  describeRevision,
  isRevisionValid,
  revisionEquals,
  revisionFromEntity,
  revisionHashCode,
  validateRevision,
} from './entities/revision.js';
export {
  createUser,
  describeUser,
  isUserValid,
  userEquals,
  userFromEntity,
  userHashCode,
  validateUser,
} from './entities/user.js';
// Utils - Error Handling
export type { ErrorHandler, ErrorStrategy } from './utils/error-handler.js';
export { createErrorHandler, normalizeError, withErrorHandlingSync } from './utils/error-handler.js';
// Utils - Hashing
export { combineHashes, hashBoolean, hashNumber, hashString } from './utils/hash.js';
// Utils - ID Generation
export type { IdGenerator, IdStrategy } from './utils/id-generator.js';
export { generateId, ID_GENERATORS, withIdentity } from './utils/id-generator.js';
// Utils - Normalization
export { areTextsEquivalent, foldText, normalizeActivityName, normalizeText } from './utils/normalize.js';
// Utils - Serialization
export { convertDatesToISOStrings, toPlainObject } from './utils/serialization.js';
// Validation
export type { ActivityNameOptions, SubjectState } from './validation/activity.js';
export {
  getAllowedActivities,
  getSeededActivityId,
  getSeededActivityName,
  isActivityAppropriate,
  isActivityNameValid,
  isKnownActivity,
  validateActivityContext,
  validateActivityName,
} from './validation/activity.js';
export type { CollectionOptions, Validatable } from './validation/collection.js';
export { isCollectionValid, isValidatable, validateCollection } from './validation/collection.js';
export { isValidIdentifier, validateIdentifier } from './validation/identifier.js';
export type { Rule } from './validation/rules.js';
export { evaluateRules, satisfiesRules } from './validation/rules.js';
export type { DescriptionOptions, DescriptionVocabulary } from './validation/text.js';
export {
  isDescriptionValid,
  isUsernameValid,
  validateDescription,
  validateDescriptionUniqueness,
  validateUsername,
} from './validation/text.js';
export { isTimestampValid, validateTimestamp, validateTimestampOrder } from './validation/timestamp.js';
