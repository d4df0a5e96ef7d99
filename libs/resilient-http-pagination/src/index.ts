import {
  ConfigurationError,
  decodeListEnvelope,
  OperationCancelledError,
  outcomeToError,
  ResilientHttpError,
  type FailureOutcome,
  type PaginationInfo,
  type PipelineOutcome,
  type QueryParams,
  type RequestDescriptor,
  type ResponseDecoder,
  type ResultSchema,
} from '@edgekit/resilient-http-core';

/**
 * Anything that runs one logical request through the resilience pipeline.
 * `HttpClient` satisfies it structurally.
 */
export interface PageExecutor {
  execute<T>(
    descriptor: RequestDescriptor,
    decode: ResponseDecoder<T>,
    options?: { signal?: AbortSignal },
  ): Promise<PipelineOutcome<T>>;
}

export interface Page<TItem = unknown> {
  index: number;
  items: TItem[];
  pagination: PaginationInfo | null;
  request: RequestDescriptor;
  /** Whether the strategy would request another page after this one. */
  hasMore: boolean;
}

export interface PaginationResult<TItem = unknown> {
  pages: Page<TItem>[];
  items: TItem[];
  pageCount: number;
  itemCount: number;
  truncated: boolean;
  truncationReason?: 'maxPages' | 'maxItems';
  durationMs: number;
}

export interface PaginationLimits {
  maxPages?: number;
  maxItems?: number;
}

export type PaginationModel = 'pageNumber' | 'cursor';

/** What a strategy sees of a fetched page when deciding on the next request. */
export interface PageExtraction {
  itemCount: number;
  pagination: PaginationInfo | null;
}

export interface PaginationStrategy<TState> {
  readonly model: PaginationModel;
  initialState(): TState;
  /** Query parameters the strategy adds on top of the caller's request. */
  toQuery(state: TState): QueryParams;
  /** Next state, or null when the sequence is finished. */
  nextState(state: TState, extraction: PageExtraction): TState | null;
}

export interface PaginateOptions<TItem, TState> {
  /** Builds the request for one page; the strategy's query parameters are merged over it. */
  buildRequest: (state: TState) => RequestDescriptor;
  strategy: PaginationStrategy<TState>;
  /** zod schema each element of the `result` array is parsed with. */
  decodeItem: ResultSchema<TItem>;
  signal?: AbortSignal;
}

export interface PaginationObserver<TItem = unknown> {
  onPage?(page: Page<TItem>): void | Promise<void>;
  onComplete?(result: PaginationResult<TItem>): void | Promise<void>;
}

export interface CollectAllOptions<TItem, TState> extends PaginateOptions<TItem, TState> {
  observer?: PaginationObserver<TItem>;
}

/** A page came back as a failure; items of earlier pages were already delivered. */
export class PaginationError extends ResilientHttpError {
  readonly pageIndex: number;
  readonly request: RequestDescriptor;

  constructor(outcome: FailureOutcome, pageIndex: number, request: RequestDescriptor) {
    const cause = outcomeToError(outcome);
    super(`Pagination stopped at page ${pageIndex}: ${cause.message}`, outcome, { cause });
    this.name = 'PaginationError';
    this.pageIndex = pageIndex;
    this.request = request;
  }
}

// ============================================================================
// Strategies
// ============================================================================

export interface PageNumberState {
  page: number;
  perPage: number;
}

export interface PageNumberConfig {
  startPage?: number;
  perPage?: number;
  pageParam?: string;
  perPageParam?: string;
}

export interface CursorState {
  cursor: string | null;
}

export interface CursorConfig {
  cursorParam?: string;
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError('Invalid pagination configuration', [`${name}: must be a positive integer`]);
  }
}

/**
 * `page` / `per_page` pagination. Continues while `page < totalPages`; when the server
 * reports `totalPages == 0` (not computed), continues while pages come back full.
 */
export function pageNumberStrategy(config: PageNumberConfig = {}): PaginationStrategy<PageNumberState> {
  const startPage = config.startPage ?? 1;
  const perPage = config.perPage ?? 20;
  const pageParam = config.pageParam ?? 'page';
  const perPageParam = config.perPageParam ?? 'per_page';
  requirePositiveInteger('startPage', startPage);
  requirePositiveInteger('perPage', perPage);

  return {
    model: 'pageNumber',
    initialState: () => ({ page: startPage, perPage }),
    toQuery: (state) => ({ [pageParam]: state.page, [perPageParam]: state.perPage }),
    nextState(state, { itemCount, pagination }) {
      const next = { ...state, page: state.page + 1 };
      if (pagination?.type === 'page' && pagination.totalPages > 0) {
        return state.page < pagination.totalPages ? next : null;
      }
      return itemCount >= state.perPage ? next : null;
    },
  };
}

/** Opaque-cursor pagination; stops at the first page without a cursor. */
export function cursorStrategy(config: CursorConfig = {}): PaginationStrategy<CursorState> {
  const cursorParam = config.cursorParam ?? 'cursor';

  return {
    model: 'cursor',
    initialState: () => ({ cursor: null }),
    toQuery: (state) => (state.cursor === null ? {} : { [cursorParam]: state.cursor }),
    nextState(_state, { pagination }) {
      const cursor = pagination?.cursor ?? null;
      return cursor ? { cursor } : null;
    },
  };
}

// ============================================================================
// Engine
// ============================================================================

function withQuery(request: RequestDescriptor, query: QueryParams): RequestDescriptor {
  return { ...request, query: { ...request.query, ...query } };
}

/**
 * Yields one page at a time. The next page is only requested when the consumer asks
 * for it, so breaking out of the loop never issues another request.
 */
export async function* paginatePages<TItem, TState>(
  executor: PageExecutor,
  options: PaginateOptions<TItem, TState>,
): AsyncGenerator<Page<TItem>, void, undefined> {
  const { buildRequest, strategy, decodeItem, signal } = options;
  let state: TState | null = strategy.initialState();

  for (let index = 0; state !== null; index += 1) {
    if (signal?.aborted) {
      throw new OperationCancelledError();
    }

    const request = withQuery(buildRequest(state), strategy.toQuery(state));
    const outcome = await executor.execute(request, (response) => decodeListEnvelope(response, decodeItem), {
      signal,
    });

    if (outcome.kind !== 'success') {
      if (outcome.kind === 'rejected' && outcome.reason === 'cancelled') {
        throw new OperationCancelledError(outcome);
      }
      throw new PaginationError(outcome, index, request);
    }

    const next: TState | null = strategy.nextState(state, {
      itemCount: outcome.value.length,
      pagination: outcome.pagination,
    });
    yield { index, items: outcome.value, pagination: outcome.pagination, request, hasMore: next !== null };
    state = next;
  }
}

/** Lazy item sequence over every page. */
export async function* paginate<TItem, TState>(
  executor: PageExecutor,
  options: PaginateOptions<TItem, TState>,
): AsyncGenerator<TItem, void, undefined> {
  for await (const page of paginatePages(executor, options)) {
    yield* page.items;
  }
}

function getLimits(limits: PaginationLimits): Required<PaginationLimits> {
  const resolved = {
    maxPages: limits.maxPages ?? Infinity,
    maxItems: limits.maxItems ?? Infinity,
  };
  const issues: string[] = [];
  if (!(resolved.maxPages >= 1)) issues.push('maxPages: must be at least 1');
  if (!(resolved.maxItems >= 1)) issues.push('maxItems: must be at least 1');
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid pagination limits', issues);
  }
  return resolved;
}

/**
 * Gathers every item into memory, stopping early at the configured limits. `truncated`
 * is only reported when the server had more to give.
 */
export async function collectAll<TItem, TState>(
  executor: PageExecutor,
  options: CollectAllOptions<TItem, TState>,
  limits: PaginationLimits = {},
): Promise<PaginationResult<TItem>> {
  const { maxPages, maxItems } = getLimits(limits);
  const { observer } = options;
  const startTime = Date.now();
  const pages: Page<TItem>[] = [];
  const items: TItem[] = [];
  let truncationReason: PaginationResult<TItem>['truncationReason'];

  for await (const page of paginatePages(executor, options)) {
    const room = maxItems - items.length;
    pages.push(page);
    items.push(...page.items.slice(0, room));

    if (observer?.onPage) {
      await observer.onPage(page);
    }

    if (page.items.length > room) {
      truncationReason = 'maxItems';
      break;
    }
    if (!page.hasMore) break;
    if (items.length >= maxItems) {
      truncationReason = 'maxItems';
      break;
    }
    if (pages.length >= maxPages) {
      truncationReason = 'maxPages';
      break;
    }
  }

  const result: PaginationResult<TItem> = {
    pages,
    items,
    pageCount: pages.length,
    itemCount: items.length,
    truncated: truncationReason !== undefined,
    truncationReason,
    durationMs: Date.now() - startTime,
  };

  if (observer?.onComplete) {
    await observer.onComplete(result);
  }

  return result;
}
