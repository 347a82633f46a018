import { IdentityGuard } from '../kernel-core/L0/Guards.js';
import { ErrorCode, LedgerError } from '../kernel-core/Errors.js';

export interface ServerConfig {
    port: number;
    dbPath: string;
    admin: string;
}

export const DEFAULT_CONFIG: ServerConfig = {
    port: 3000,
    dbPath: 'ledger.db',
    admin: 'admin'
};

/**
 * Reads PORT, LEDGER_DB_PATH and LEDGER_ADMIN. Unset or empty variables fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const port = env.PORT ? Number(env.PORT) : DEFAULT_CONFIG.port;
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new LedgerError(ErrorCode.CONFIG_INVALID, `PORT must be an integer in 0-65535, got ${env.PORT}`);
    }

    const admin = env.LEDGER_ADMIN || DEFAULT_CONFIG.admin;
    const check = IdentityGuard({ identity: admin });
    if (!check.ok) {
        throw new LedgerError(ErrorCode.CONFIG_INVALID, `LEDGER_ADMIN: ${check.violation}`);
    }

    return {
        port,
        dbPath: env.LEDGER_DB_PATH || DEFAULT_CONFIG.dbPath,
        admin
    };
}
