import { config as loadEnv } from 'dotenv';
import { fold } from './shared/result.js';
import { loadConfig } from './composition/config.js';
import { buildContainer } from './composition/container.js';

// Load environment variables from .env file
loadEnv();

function main(args: readonly string[]): number {
    const configResult = loadConfig(process.env);
    if (!configResult.ok) {
        console.error(`❌ ${configResult.error.message}`);
        return 1;
    }

    const container = buildContainer(configResult.value);
    container.logger.info('Summing quantities', { inputs: args.length });

    return fold(
        container.sumQuantitiesUseCase.execute(args),
        (summary) => {
            console.log(`✅ ${summary.count} quantities, total ${summary.total}`);
            return 0;
        },
        (error) => {
            console.error(`❌ ${error.message}`);
            return 1;
        }
    );
}

process.exitCode = main(process.argv.slice(2));
