import { v4 as uuidv4 } from 'uuid';
import {
    TranslationKey,
    TranslationRequest,
    TranslationResult,
    createTranslationKey,
    keyToString,
} from '../domain/entities/Translation';
import {
    PersistenceConflictError,
    PersistenceUnavailableError,
    TranslationError,
    TranslationUnavailableError,
} from '../domain/errors/TranslationErrors';
import { ITranslationCache } from '../domain/ports/ITranslationCache';
import { ITranslationClient } from '../domain/ports/ITranslationClient';
import { ITranslationStore } from '../domain/ports/ITranslationStore';
import { InFlightRegistry } from './concurrency/InFlightRegistry';
import { KeyedMutex } from './concurrency/KeyedMutex';

/**
 * States a request moves through. Terminal states are REPLY and ERROR_REPLY.
 */
export type PipelineState =
    | 'RECEIVED'
    | 'CACHE_CHECK'
    | 'CACHE_HIT'
    | 'CACHE_MISS'
    | 'PERSIST_CHECK'
    | 'PERSIST_HIT'
    | 'PERSIST_MISS'
    | 'TRANSLATE'
    | 'TRANSLATE_SUCCESS'
    | 'TRANSLATE_FAILURE'
    | 'PERSIST_WRITE'
    | 'CACHE_FILL'
    | 'REPLY'
    | 'ERROR_REPLY';

/** Where the reply's result came from */
export type ResultSource = 'cache' | 'store' | 'translator';

interface OutcomeBase {
    requestId: string;
    request: TranslationRequest;
    key: TranslationKey;
    /** True when this request waited on another request's miss resolution */
    coalesced: boolean;
    states: PipelineState[];
}

export interface PipelineReply extends OutcomeBase {
    status: 'reply';
    result: TranslationResult;
    source: ResultSource;
    /** True when persistence was unavailable and the reply is cache-only */
    degraded: boolean;
}

export interface PipelineErrorReply extends OutcomeBase {
    status: 'error_reply';
    error: TranslationError;
}

export type PipelineOutcome = PipelineReply | PipelineErrorReply;

/**
 * Shared result of resolving a cache miss; handed unchanged to every
 * coalesced waiter.
 */
type MissResolution =
    | { ok: true; result: TranslationResult; source: 'store' | 'translator'; degraded: boolean; states: PipelineState[] }
    | { ok: false; error: TranslationError; states: PipelineState[] };

export interface TranslationPipelineDependencies {
    cache: ITranslationCache;
    store: ITranslationStore;
    translator: ITranslationClient;
}

/**
 * Orchestrates a translation request: cache, then persistence, then the
 * external translator with write-through. Never throws; every failure is
 * turned into an error outcome or a degraded continuation.
 */
export class TranslationPipeline {
    private readonly cache: ITranslationCache;
    private readonly store: ITranslationStore;
    private readonly translator: ITranslationClient;
    private readonly inFlight = new InFlightRegistry<MissResolution>();
    private readonly writeLocks = new KeyedMutex();

    constructor(deps: TranslationPipelineDependencies) {
        this.cache = deps.cache;
        this.store = deps.store;
        this.translator = deps.translator;
    }

    async process(request: TranslationRequest): Promise<PipelineOutcome> {
        const requestId = `req_${uuidv4().substring(0, 8)}`;
        const key = createTranslationKey(request);
        const states: PipelineState[] = ['RECEIVED', 'CACHE_CHECK'];

        const cached = this.cache.lookup(key);
        if (cached) {
            states.push('CACHE_HIT', 'REPLY');
            console.log(`[Pipeline] ${requestId} cache hit (${key.sourceLang} -> ${key.targetLang})`);
            return {
                status: 'reply',
                requestId,
                request,
                key,
                coalesced: false,
                states,
                result: cached,
                source: 'cache',
                degraded: false,
            };
        }
        states.push('CACHE_MISS');

        const { promise, coalesced } = this.inFlight.run(keyToString(key), () => this.resolveMiss(requestId, request, key));
        if (coalesced) {
            console.log(`[Pipeline] ${requestId} joined in-flight translation (${key.sourceLang} -> ${key.targetLang})`);
        }
        const resolution = await promise;
        states.push(...resolution.states);

        if (!resolution.ok) {
            states.push('ERROR_REPLY');
            return { status: 'error_reply', requestId, request, key, coalesced, states, error: resolution.error };
        }

        states.push('REPLY');
        return {
            status: 'reply',
            requestId,
            request,
            key,
            coalesced,
            states,
            result: resolution.result,
            source: resolution.source,
            degraded: resolution.degraded,
        };
    }

    /**
     * Loads the most recent persisted translations into the cache.
     * @returns Number of entries inserted
     */
    async warmCache(limit: number = this.cache.capacity): Promise<number> {
        const boundedLimit = Math.min(limit, this.cache.capacity);
        if (boundedLimit <= 0) {
            return 0;
        }

        try {
            const rows = await this.store.loadRecent(boundedLimit);
            // Oldest first, so the newest rows end up most recently used.
            for (const row of [...rows].reverse()) {
                this.cache.insert(row.key, row.result);
            }
            console.log(`[Pipeline] Warmed cache with ${rows.length} persisted translations`);
            return rows.length;
        } catch (error) {
            if (error instanceof PersistenceUnavailableError) {
                console.warn(`[Pipeline] Cache warm-up skipped: ${error.message}`);
                return 0;
            }
            throw error;
        }
    }

    private async resolveMiss(requestId: string, request: TranslationRequest, key: TranslationKey): Promise<MissResolution> {
        const states: PipelineState[] = ['PERSIST_CHECK'];
        let degraded = false;

        try {
            let stored: TranslationResult | null = null;
            try {
                stored = await this.store.load(key);
            } catch (error) {
                if (!(error instanceof PersistenceUnavailableError)) {
                    throw error;
                }
                degraded = true;
                console.warn(`[Pipeline] ${requestId} persistence unavailable on load, continuing cache-only: ${error.message}`);
            }

            if (stored) {
                states.push('PERSIST_HIT');
                const value = stored;
                await this.writeLocks.runExclusive(keyToString(key), () => this.cache.insert(key, value));
                states.push('CACHE_FILL');
                console.log(`[Pipeline] ${requestId} served from persistence`);
                return { ok: true, result: stored, source: 'store', degraded, states };
            }

            states.push('PERSIST_MISS', 'TRANSLATE');
            let translated: TranslationResult;
            try {
                translated = await this.translator.translate(request);
            } catch (error) {
                states.push('TRANSLATE_FAILURE');
                const failure = toTranslationError(error);
                console.error(`[Pipeline] ${requestId} translation failed: ${failure.name}: ${failure.message}`);
                return { ok: false, error: failure, states };
            }
            states.push('TRANSLATE_SUCCESS', 'PERSIST_WRITE');

            const written = await this.writeThrough(requestId, key, translated);
            states.push('CACHE_FILL');
            return {
                ok: true,
                result: written.result,
                source: 'translator',
                degraded: degraded || written.degraded,
                states,
            };
        } catch (error) {
            const failure = toTranslationError(error);
            console.error(`[Pipeline] ${requestId} unexpected failure:`, error);
            return { ok: false, error: failure, states };
        }
    }

    /**
     * Persists then caches a fresh result under the key's lock. A conflicting
     * stored row wins and is what gets cached and returned.
     */
    private async writeThrough(
        requestId: string,
        key: TranslationKey,
        result: TranslationResult
    ): Promise<{ result: TranslationResult; degraded: boolean }> {
        return this.writeLocks.runExclusive(keyToString(key), async () => {
            let value = result;
            let degraded = false;

            try {
                await this.store.store(key, result);
            } catch (error) {
                if (error instanceof PersistenceConflictError) {
                    console.error(
                        `[Pipeline] ${requestId} data integrity: conflicting translation for ${error.key}, keeping stored value`
                    );
                    value = error.existing;
                } else if (error instanceof PersistenceUnavailableError) {
                    degraded = true;
                    console.warn(`[Pipeline] ${requestId} persistence unavailable on write, result cached only: ${error.message}`);
                } else {
                    throw error;
                }
            }

            this.cache.insert(key, value);
            return { result: value, degraded };
        });
    }
}

function toTranslationError(error: unknown): TranslationError {
    if (error instanceof TranslationError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TranslationUnavailableError(message, undefined, error);
}
