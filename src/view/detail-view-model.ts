/**
 * Detail view model: one record looked up by key.
 *
 *   idle → loading → success | error
 */

import type { KeyedRecord } from "../api/records.js";
import { describeError } from "../api/errors.js";
import type { BoundedDataSource } from "../cache/bounded-cache.js";
import { ChangeNotifier, LOADING, SUCCESS, errorState } from "./view-state.js";
import { log } from "../logger.js";

export class DetailViewModel<R extends KeyedRecord> extends ChangeNotifier {
  private selected: R | null = null;
  private generation = 0;

  constructor(private readonly source: Pick<BoundedDataSource<R>, "getByKey">) {
    super();
  }

  get record(): R | null {
    return this.selected;
  }

  async load(key: number): Promise<void> {
    const generation = ++this.generation;
    this.transition(LOADING);

    try {
      const record = await this.source.getByKey(key);
      if (generation !== this.generation) return this.dropStale(key);
      this.selected = record;
      this.transition(SUCCESS);
    } catch (err) {
      if (generation !== this.generation) return this.dropStale(key);
      this.selected = null;
      this.transition(errorState(describeError(err)));
    }
  }

  private dropStale(key: number): void {
    log.view.debug({ key }, "detail:stale-completion-dropped");
  }
}
