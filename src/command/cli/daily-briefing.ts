#!/usr/bin/env node
import { ConfigLoader } from '@/utils/config-loader';
import { buildBriefingService } from '@/command/build-briefing-service';
import { logger } from '@/utils/logger';

async function main(): Promise<void> {
    logger.info('Security news briefing started', { startedAt: new Date().toISOString() });

    const config = ConfigLoader.getInstance().loadConfig();
    const report = await buildBriefingService(config).run();

    if (report.delivered === 0) {
        logger.info('No new articles today, the channel stays quiet');
    } else {
        logger.info('Done', { delivered: report.delivered, failed: report.failed });
    }
}

main().catch((error: unknown) => {
    logger.error('Security news briefing failed', {
        error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
});
