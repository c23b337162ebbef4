export type EngineLogLevel = 'INFO' | 'VERBOSE' | 'DEBUG' | 'WARN' | 'CRITICAL';
export type EngineLogChannel = 'COMBAT' | 'EFFECTS' | 'PROGRESSION' | 'PICKUP' | 'SYSTEM';

const TAG_PATTERN = /^\[(INFO|VERBOSE|DEBUG|WARN|CRITICAL)\|([A-Z_]+)\]\s*/i;

export const isTaggedMessage = (text: string): boolean => TAG_PATTERN.test(text);

export const tagMessage = (
    text: string,
    level: EngineLogLevel = 'INFO',
    channel: EngineLogChannel = 'SYSTEM'
): string => {
    if (!text) return '';
    if (isTaggedMessage(text)) return text;
    return `[${level}|${channel}] ${text}`;
};

export const appendTaggedMessage = (
    existing: string[] | undefined,
    text: string,
    level: EngineLogLevel,
    channel: EngineLogChannel,
    limit: number = 50
): string[] => {
    const next = tagMessage(text, level, channel);
    const base = [...(existing || [])];
    if (!next) return base.slice(-limit);
    if (base[base.length - 1] === next) return base.slice(-limit);
    return [...base, next].slice(-limit);
};

/**
 * Sink for engine diagnostics. The core never throws for recoverable
 * conditions; it reports them here and keeps ticking.
 */
export interface EngineLogger {
    log(level: EngineLogLevel, channel: EngineLogChannel, text: string): void;
}

export interface BufferedLogger extends EngineLogger {
    readonly messages: readonly string[];
    clear(): void;
}

/** Keeps the last `limit` tagged lines, collapsing consecutive duplicates. */
export const createBufferedLogger = (limit: number = 50): BufferedLogger => {
    let messages: string[] = [];
    return {
        get messages() {
            return messages;
        },
        log(level, channel, text) {
            messages = appendTaggedMessage(messages, text, level, channel, limit);
        },
        clear() {
            messages = [];
        }
    };
};

export const consoleLogger: EngineLogger = {
    log(level, channel, text) {
        const line = tagMessage(text, level, channel);
        if (!line) return;
        if (level === 'WARN' || level === 'CRITICAL') console.warn(`[ENGINE] ${line}`);
        else console.log(`[ENGINE] ${line}`);
    }
};

export const silentLogger: EngineLogger = {
    log() {
        // discard
    }
};
