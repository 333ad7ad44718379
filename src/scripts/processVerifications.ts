/**
 * Verification Queue Worker
 *
 * Processes brand and influencer verifications whose delay has elapsed.
 * Meant to run from cron every minute or two; overlapping runs are safe.
 *
 * Usage:
 *   npx ts-node src/scripts/processVerifications.ts
 *   npx ts-node src/scripts/processVerifications.ts --kind brand --limit 20
 *   npx ts-node src/scripts/processVerifications.ts --no-auto-approve
 */

import 'reflect-metadata';
import { dbConnect, sequelize } from '../config/database';
import { VerificationSubjectKind } from '../models/VerificationQueueItem';
import { verificationQueueService } from '../services/VerificationQueueService';
import { logger, errorMessage } from '../utils/logger';

const argValue = (name: string): string | undefined => {
    const index = process.argv.indexOf(name);
    return index >= 0 ? process.argv[index + 1] : undefined;
};

const parseKind = (value: string | undefined): VerificationSubjectKind | undefined => {
    if (value === undefined) return undefined;
    if (value === 'brand' || value === 'influencer') return value;
    throw new Error(`--kind must be "brand" or "influencer", got "${value}"`);
};

const parseLimit = (value: string | undefined): number | undefined => {
    if (value === undefined) return undefined;
    const limit = Number(value);
    if (!Number.isInteger(limit) || limit < 1) throw new Error(`--limit must be a positive integer, got "${value}"`);
    return limit;
};

async function run() {
    const kind = parseKind(argValue('--kind'));
    const limit = parseLimit(argValue('--limit'));
    const autoApprove = process.argv.includes('--no-auto-approve') ? false : undefined;

    const connected = await dbConnect(1, 0);
    if (!connected) {
        process.exitCode = 1;
        return;
    }

    const stats = await verificationQueueService.drain({ kind, limit, autoApprove });
    logger.info('Verification worker finished', { ...stats });
    if (stats.failed > 0) process.exitCode = 2;
}

async function main() {
    try {
        await run();
    } finally {
        await sequelize.close();
    }
}

main().catch((error: unknown) => {
    logger.error('Verification worker crashed', { error: errorMessage(error) });
    process.exitCode = 1;
});
