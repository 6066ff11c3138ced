import type { Predicate, Row } from '../types.js';
import { numberArgument, type TableFunction, type TableFunctionState } from '../../functions/table-function.js';

export interface TicksBind {
  batches: number;
  /** Set by filter pushdown on `k = <literal>` */
  k: number | null;
}

export class TicksState implements TableFunctionState {
  emitted = 0;
  closeCount = 0;

  async close(): Promise<void> {
    this.closeCount++;
  }
}

/**
 * ticks(batches): `batches` batches of two rows { tick, k }
 */
export function ticksFunction(states: TicksState[] = []): TableFunction<TicksBind, TicksState> {
  return {
    name: 'ticks',

    bind: ({ args }) => ({
      bindData: { batches: args.length > 0 ? numberArgument('ticks', 'batches', args[0]) : 3, k: null },
      columns: [
        { name: 'tick', type: 'integer' },
        { name: 'k', type: 'integer' },
      ],
    }),

    pushdownFilters: (bind, predicates: Predicate[]) =>
      predicates.filter((p) => {
        if (
          p.type === 'comparison' &&
          p.op === 'eq' &&
          p.left.type === 'columnRef' &&
          p.left.column === 'k' &&
          p.right.type === 'literal' &&
          typeof p.right.value === 'number'
        ) {
          bind.k = p.right.value;
          return false;
        }
        return true;
      }),

    cardinality: (bind) => bind.batches * 2,

    describe: (bind) => ({ k: bind.k ?? 'any' }),

    initGlobal: () => {
      const state = new TicksState();
      states.push(state);
      return state;
    },

    scan: async (bind, state) => {
      if (state.emitted >= bind.batches) return [];
      const batch = state.emitted++;
      const k = bind.k ?? batch;
      return [0, 1].map((i): Row => ({ tick: batch * 2 + i, k }));
    },

    progress: (bind, state) => (bind.batches === 0 ? -1 : (state.emitted / bind.batches) * 100),
  };
}
