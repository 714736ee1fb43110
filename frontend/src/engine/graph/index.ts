/**
 * Power Layout Graph — Public API
 *
 * Re-exports models, operations, queries and the Zustand store.
 */

// ─── Models ───
export type {
    BlockKind,
    RootBlockKind,
    LocationChildKind,
    LogicalPoint,
    Block,
    EquipmentBlock,
    LocationBlock,
    SupplyBlock,
    AlternatorBlock,
    ConductorBlock,
    BusbarBlock,
    TransformerUpsBlock,
    LoadBlock,
    ExternalBusbarBlock,
    RowBlock,
    RowProtection,
    Terminal,
    Connection,
    ConnectionCheckResult,
    ProjectState,
    ProjectSnapshot,
} from './models';
export {
    ROOT_PARENT_ID,
    getRenderPosition,
    isEquipmentBlock,
    isSameConnection,
    touchesTerminal,
} from './models';

// ─── Errors ───
export {
    DiagramError,
    NotFoundError,
    InvalidConnectionError,
    InvalidBlockError,
    InvalidProjectError,
    ViewNotReadyError,
    isDiagramError,
} from './errors';
export type { DiagramErrorCode } from './errors';

// ─── Store ───
export { useProjectStore, initialProjectState } from './projectStore';
export type { ProjectStore } from './projectStore';

// ─── Operations ───
export {
    KIND_LABELS,
    PARENT_KIND,
    TERMINAL_NAMES,
    MAX_NAME_LENGTH,
    validateName,
} from './blockOperations';

// ─── Project info ───
export {
    DEFAULT_PROJECT_INFO,
    PROJECT_INFO_LABELS,
    PROJECT_INFO_FIELDS,
    MAX_PERSON_NAME_LENGTH,
    isTextField,
    validateProjectInfo,
    formatProjectVersion,
} from './projectInfo';
export type { ProjectInfo, ProjectInfoField } from './projectInfo';

// ─── Queries ───
export { createGraphReader } from './queries';
export type { GraphReader } from './queries';

// ─── Validation ───
export { checkConnection } from './connectionValidation';
