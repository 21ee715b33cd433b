/**
 * PlayerProbe - Asks an embedded player which quality tiers it can stream.
 *
 * The player is created muted and invisible, allowed to start playing, and
 * queried once playback has settled. Every outcome is a value: the probe
 * never rejects.
 */

import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const PLAYER_STATE_PLAYING = 1;

export const DEFAULT_PROBE_TIMEOUT_MS = 15000;
export const DEFAULT_SETTLE_MS = 750;

export const PROBE_PLAYER_VARS: Readonly<Record<string, number>> = Object.freeze({
    autoplay: 1,
    mute: 1,
    controls: 0,
    disablekb: 1,
    fs: 0,
    iv_load_policy: 3,
    modestbranding: 1,
    playsinline: 1,
});

export interface PlayerEvents {
    onReady: () => void;
    onStateChange: (state: number) => void;
    onError: (code: number | string) => void;
}

export interface PlayerOptions {
    videoId: string;
    width: number;
    height: number;
    playerVars: Readonly<Record<string, number>>;
    events: PlayerEvents;
}

export interface PlayerHandle {
    mute(): Promise<void>;
    getAvailableQualityLevels(): Promise<string[]>;
    stopVideo(): Promise<void>;
    destroy(): Promise<void>;
}

export interface PlayerHost {
    createPlayer(options: PlayerOptions): Promise<PlayerHandle>;
}

export type PlayerProbeResult =
    | { kind: 'level'; level: string | null }
    | { kind: 'timeout' }
    | { kind: 'player_error'; code: number | string };

export interface PlayerProbeOptions {
    timeoutMs?: number;
    settleMs?: number;
}

interface ProbeSession {
    videoId: string;
    handle: PlayerHandle | null;
    settled: boolean;
    readyBeforeHandle: boolean;
    settling: boolean;
    timers: NodeJS.Timeout[];
    // Settles once player construction has succeeded or failed
    created: Promise<void>;
    // Settles once the player is stopped and destroyed
    disposed: Promise<void>;
    finish: (result: PlayerProbeResult) => void;
}

export class PlayerProbe {
    private readonly host: PlayerHost;
    private readonly timeoutMs: number;
    private readonly settleMs: number;
    private active: ProbeSession | null = null;

    constructor(host: PlayerHost, options: PlayerProbeOptions = {}) {
        this.host = host;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
        this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    }

    probe(videoId: string, timeoutMs: number = this.timeoutMs): Promise<PlayerProbeResult> {
        // One player at a time: the next one is built only after the previous is gone
        const previous = this.active;
        previous?.finish({ kind: 'player_error', code: 'superseded' });
        const previousDisposed = previous?.disposed ?? Promise.resolve();

        return new Promise((resolve) => {
            const session: ProbeSession = {
                videoId,
                handle: null,
                settled: false,
                readyBeforeHandle: false,
                settling: false,
                timers: [],
                created: Promise.resolve(),
                disposed: Promise.resolve(),
                finish: (result) => {
                    if (session.settled) return;
                    session.settled = true;
                    session.timers.forEach((timer) => clearTimeout(timer));
                    session.timers = [];
                    if (this.active === session) this.active = null;
                    logger.debug('Player probe finished', { videoId, result: result.kind });
                    session.disposed = session.created.then(() => this.teardown(session));
                    resolve(result);
                },
            };
            this.active = session;

            session.timers.push(setTimeout(() => session.finish({ kind: 'timeout' }), timeoutMs));

            const events: PlayerEvents = {
                onReady: () => {
                    if (session.settled) return;
                    if (session.handle) this.mute(session, session.handle);
                    else session.readyBeforeHandle = true;
                },
                onStateChange: (state) => {
                    if (session.settled || session.settling || state !== PLAYER_STATE_PLAYING) return;
                    session.settling = true;
                    session.timers.push(setTimeout(() => this.readLevel(session), this.settleMs));
                },
                onError: (code) => session.finish({ kind: 'player_error', code }),
            };

            session.created = previousDisposed
                .then(async () =>
                    session.settled
                        ? null
                        : this.host.createPlayer({ videoId, width: 0, height: 0, playerVars: PROBE_PLAYER_VARS, events }),
                )
                .then(
                    (handle) => {
                        if (!handle) return;
                        // Kept even when already settled so the disposal step tears it down
                        session.handle = handle;
                        if (!session.settled && session.readyBeforeHandle) {
                            this.mute(session, handle);
                        }
                    },
                    (error: unknown) => {
                        logger.warn('Player construction failed', { videoId, error: errorMessage(error) });
                        session.finish({ kind: 'player_error', code: 'init_error' });
                    },
                );
        });
    }

    private readLevel(session: ProbeSession): void {
        const handle = session.handle;
        if (session.settled || !handle) return;

        handle.getAvailableQualityLevels().then(
            (levels) => session.finish({ kind: 'level', level: levels[0] ?? null }),
            (error: unknown) => {
                logger.warn('Reading quality levels failed', { videoId: session.videoId, error: errorMessage(error) });
                session.finish({ kind: 'player_error', code: 'quality_read_error' });
            },
        );
    }

    private mute(session: ProbeSession, handle: PlayerHandle): void {
        handle.mute().catch((error: unknown) => {
            logger.debug('Muting player failed', { videoId: session.videoId, error: errorMessage(error) });
        });
    }

    private async teardown(session: ProbeSession): Promise<void> {
        const handle = session.handle;
        if (!handle) return;
        session.handle = null;

        const logFailure = (error: unknown) => {
            logger.debug('Player teardown step failed', { videoId: session.videoId, error: errorMessage(error) });
        };
        await handle.stopVideo().catch(logFailure);
        await handle.destroy().catch(logFailure);
    }
}
