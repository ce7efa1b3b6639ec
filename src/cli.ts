import 'reflect-metadata';
import {CommanderError} from 'commander';
import {config as loadDotenv} from 'dotenv';
import {createAccountCli} from './account/adapter/in/cli/AccountCli';
import {runWithApplication} from './config/app-initializer';
import {loadConfig} from './config/env';

async function main(): Promise<void> {
    loadDotenv();
    const config = loadConfig();

    await runWithApplication(config, async () => {
        try {
            await createAccountCli().parseAsync(process.argv);
        } catch (error) {
            // commander は既にメッセージを出力している
            if (error instanceof CommanderError) {
                process.exitCode = error.exitCode;
                return;
            }
            throw error;
        }
    });
}

main().catch((error: unknown) => {
    console.error('❌', error);
    process.exit(1);
});
