/**
 * Create an administrator account.
 *
 * Usage:
 *   npx ts-node src/scripts/createAdmin.ts --email admin@example.com --username admin --password <password>
 */

import 'reflect-metadata';
import { dbConnect, sequelize } from '../config/database';
import { accountService } from '../services/AccountService';
import { logger, errorMessage } from '../utils/logger';

const argValue = (name: string): string | undefined => {
    const index = process.argv.indexOf(name);
    return index >= 0 ? process.argv[index + 1] : undefined;
};

async function run() {
    const email = argValue('--email');
    const username = argValue('--username');
    const password = argValue('--password');
    if (!email || !username || !password) {
        throw new Error('--email, --username and --password are required');
    }

    if (!(await dbConnect(1, 0))) {
        process.exitCode = 1;
        return;
    }

    const admin = await accountService.createAdmin(email, username, password);
    logger.info('Admin account created', { userId: admin.id, email: admin.email });
}

async function main() {
    try {
        await run();
    } finally {
        await sequelize.close();
    }
}

main().catch((error: unknown) => {
    logger.error('Admin creation failed', { error: errorMessage(error) });
    process.exitCode = 1;
});
