/**
 * Paged list view model (infinite scroll).
 *
 *   idle → loading → success | error
 *   success → loading-more → success | error
 *   refresh: clear the source cache, then loadInitial()
 *
 * loadMore() is a silent no-op while a page is already on its way
 * (loading-more), while loadInitial() is still in flight (loading), or once
 * the source reports no more records. The guard is a plain state check and
 * assumes calls come from one UI context at a time. A loadMore() failure
 * keeps every page already shown.
 *
 * loadInitial() and refresh() start a new generation: completions from an
 * older generation (for instance a loadMore() still in flight when the user
 * pulled to refresh) are dropped without a transition.
 */

import type { KeyedRecord } from "../api/records.js";
import { assertInteger, describeError } from "../api/errors.js";
import type { PagedDataSource } from "../cache/paged-cache.js";
import { DEFAULT_PAGE_SIZE } from "../config.js";
import { ChangeNotifier, LOADING, LOADING_MORE, SUCCESS, errorState } from "./view-state.js";
import { log } from "../logger.js";

export interface PagedListViewModelOptions<R extends KeyedRecord> {
  source: PagedDataSource<R>;
  /** Records per page (default 20). */
  pageSize?: number;
}

export class PagedListViewModel<R extends KeyedRecord> extends ChangeNotifier {
  private readonly source: PagedDataSource<R>;
  readonly pageSize: number;
  private items: R[] = [];
  private page = 0;
  private generation = 0;

  constructor(opts: PagedListViewModelOptions<R>) {
    super();
    const pageSize = opts.pageSize ?? DEFAULT_PAGE_SIZE;
    assertInteger("pageSize", pageSize, 1);
    this.source = opts.source;
    this.pageSize = pageSize;
  }

  get records(): readonly R[] {
    return this.items;
  }

  /** Index of the next page loadMore() will request. */
  get currentPage(): number {
    return this.page;
  }

  get hasMore(): boolean {
    return this.source.hasMore;
  }

  get totalLoaded(): number {
    return this.source.totalLoaded;
  }

  async loadInitial(): Promise<void> {
    const generation = ++this.generation;
    this.page = 0;
    this.items = [];
    this.transition(LOADING);

    try {
      const first = await this.source.getPage(0, this.pageSize);
      if (generation !== this.generation) return this.dropStale("loadInitial", generation);
      this.items = [...first];
      this.page = 1;
      this.transition(SUCCESS);
    } catch (err) {
      if (generation !== this.generation) return this.dropStale("loadInitial", generation);
      this.transition(errorState(describeError(err)));
    }
  }

  async loadMore(): Promise<void> {
    const status = this.state.status;
    if (status === "loading-more" || status === "loading" || !this.hasMore) {
      return;
    }

    const generation = this.generation;
    this.transition(LOADING_MORE);

    try {
      const next = await this.source.getPage(this.page, this.pageSize);
      if (generation !== this.generation) return this.dropStale("loadMore", generation);
      // An empty page is the legitimate end of the data, not an error
      this.items = [...this.items, ...next];
      this.page++;
      this.transition(SUCCESS);
    } catch (err) {
      if (generation !== this.generation) return this.dropStale("loadMore", generation);
      this.transition(errorState(describeError(err)));
    }
  }

  async refresh(): Promise<void> {
    this.source.clearCache();
    await this.loadInitial();
  }

  private dropStale(op: string, generation: number): void {
    log.view.debug({ op, generation, current: this.generation }, "paged:stale-completion-dropped");
  }
}
