import path from 'path';
import winston from 'winston';
import Transport from 'winston-transport';
import { SupabaseClient } from '@supabase/supabase-js';
import { LoggingConfig } from '../config/botConfig';

// Lines carrying these tags are mirrored to the bot_logs table.
const CRITICAL_TAGS = ['ENTRY', 'EXIT', 'RISK', 'SESSION'];

export function isCriticalLogLine(level: string, message: string): boolean {
    return (
        level === 'error' ||
        level === 'warn' ||
        CRITICAL_TAGS.some(tag => message.includes(tag))
    );
}

class SupabaseCriticalTransport extends Transport {
    private client: SupabaseClient;

    constructor(opts: Transport.TransportStreamOptions & { supabaseClient: SupabaseClient }) {
        super(opts);
        this.client = opts.supabaseClient;
    }

    log(info: { level: string; message: string }, callback: () => void) {
        setImmediate(() => {
            this.emit('logged', info);
        });

        if (isCriticalLogLine(info.level, info.message)) {
            Promise.resolve(
                this.client.from('bot_logs').insert({
                    action: info.level,
                    details: { message: info.message },
                    timestamp: new Date().toISOString(),
                })
            ).catch((err: unknown) => {
                // The logger cannot log its own failure; stderr is the last resort.
                const msg = err instanceof Error ? err.message : String(err);
                process.stderr.write(`[LOGGING] bot_logs insert failed: ${msg}\n`);
            });
        }

        callback();
    }
}

const logger = winston.createLogger({
    level: 'info',
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.simple()
            ),
        }),
    ],
});

/**
 * Attach the rotating file transports (and the Supabase mirror when a client
 * is available). Called once by start.ts after the config is loaded.
 */
export function configureLogger(config: LoggingConfig, supabaseClient: SupabaseClient | null): void {
    logger.level = config.level;

    logger.add(new winston.transports.File({
        filename: path.join(config.dir, 'error.log'),
        level: 'error',
        maxsize: config.maxBytes,
        maxFiles: config.backupCount,
    }));
    logger.add(new winston.transports.File({
        filename: path.join(config.dir, 'combined.log'),
        maxsize: config.maxBytes,
        maxFiles: config.backupCount,
    }));

    if (supabaseClient) {
        logger.add(new SupabaseCriticalTransport({ supabaseClient }));
        logger.info('[LOGGING] Critical logging to Supabase enabled');
    } else {
        logger.info('[LOGGING] Supabase logging disabled – no service role key');
    }
}

export default logger;
