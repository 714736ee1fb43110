/**
 * Graph Queries — read-only view over a ProjectState.
 *
 * Canvas code receives a GraphReader rather than the store so geometry
 * can be computed from any state snapshot.
 */

import type {
    Block,
    Connection,
    ProjectState,
    RowBlock,
    Terminal,
} from './models';
import { touchesTerminal } from './models';
import { NotFoundError } from './errors';

export interface GraphReader {
    /** Throws NotFoundError for unknown ids */
    getBlock(id: number): Block;
    findBlock(id: number): Block | null;
    getAllBlocks(): Block[];
    getChildren(parentId: number): Block[];
    /** Rows of a busbar in creation order */
    getRows(busbarId: number): RowBlock[];
    getTerminal(id: number): Terminal;
    /** Terminals of a block ordered by side */
    getTerminals(blockId: number): Terminal[];
    getConnections(terminalId: number): Connection[];
    getAllConnections(): Connection[];
}

export function createGraphReader(state: ProjectState): GraphReader {
    const reader: GraphReader = {
        getBlock(id) {
            const block = state.blocks[id];
            if (!block) throw new NotFoundError('Block', id);
            return block;
        },

        findBlock: (id) => state.blocks[id] ?? null,

        getAllBlocks: () => Object.values(state.blocks),

        getChildren: (parentId) =>
            Object.values(state.blocks).filter((b) => b.parentId === parentId),

        getRows(busbarId) {
            const rows: RowBlock[] = [];
            for (const block of Object.values(state.blocks)) {
                if (block.kind === 'row' && block.parentId === busbarId) rows.push(block);
            }
            return rows.sort((a, b) => a.id - b.id);
        },

        getTerminal(id) {
            const terminal = state.terminals[id];
            if (!terminal) throw new NotFoundError('Terminal', id);
            return terminal;
        },

        getTerminals: (blockId) =>
            Object.values(state.terminals)
                .filter((t) => t.blockId === blockId)
                .sort((a, b) => a.side - b.side),

        getConnections: (terminalId) =>
            state.connections.filter((c) => touchesTerminal(c, terminalId)),

        getAllConnections: () => state.connections,
    };
    return reader;
}
