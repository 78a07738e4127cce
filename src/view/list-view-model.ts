/**
 * List view model for a bounded dataset.
 *
 *   idle → loading → success | error
 *   success | error → loading   (refresh)
 *
 * load() and refresh() never reject: every failure becomes an error state.
 * Only the latest load applies its result; an older completion that arrives
 * afterwards is dropped without a transition.
 */

import type { KeyedRecord, User } from "../api/records.js";
import { describeError } from "../api/errors.js";
import type { BoundedDataSource } from "../cache/bounded-cache.js";
import { ChangeNotifier, LOADING, SUCCESS, errorState } from "./view-state.js";
import { log } from "../logger.js";

/** Picks the text fields search() matches against. */
export type SearchFields<R> = (record: R) => readonly [string, string];

export interface ListViewModelOptions<R extends KeyedRecord> {
  source: BoundedDataSource<R>;
  searchFields: SearchFields<R>;
}

export class ListViewModel<R extends KeyedRecord> extends ChangeNotifier {
  private readonly source: BoundedDataSource<R>;
  private readonly searchFields: SearchFields<R>;
  private items: readonly R[] = [];
  private generation = 0;

  constructor(opts: ListViewModelOptions<R>) {
    super();
    this.source = opts.source;
    this.searchFields = opts.searchFields;
  }

  get records(): readonly R[] {
    return this.items;
  }

  /** Derived from the records, never stored separately. */
  get hasData(): boolean {
    return this.items.length > 0;
  }

  async load(): Promise<void> {
    const generation = ++this.generation;
    this.transition(LOADING);

    try {
      const records = await this.source.getAll();
      if (generation !== this.generation) return this.dropStale(generation);
      this.items = records;
      this.transition(SUCCESS);
    } catch (err) {
      if (generation !== this.generation) return this.dropStale(generation);
      this.items = [];
      this.transition(errorState(describeError(err)));
    }
  }

  /** Invalidate the cache, then load; always reaches the source. */
  async refresh(): Promise<void> {
    this.source.invalidate();
    await this.load();
  }

  /**
   * Case-insensitive substring match over the two search fields of the
   * records currently held. Empty query → all records. No side effects.
   */
  search(query: string): readonly R[] {
    if (query.length === 0) return this.items;
    const needle = query.toLowerCase();
    return this.items.filter((record) => {
      const [first, second] = this.searchFields(record);
      return first.toLowerCase().includes(needle) || second.toLowerCase().includes(needle);
    });
  }

  private dropStale(generation: number): void {
    log.view.debug({ generation, current: this.generation }, "list:stale-completion-dropped");
  }
}

export function createUserListViewModel(source: BoundedDataSource<User>): ListViewModel<User> {
  return new ListViewModel<User>({
    source,
    searchFields: (user) => [user.name, user.email],
  });
}
