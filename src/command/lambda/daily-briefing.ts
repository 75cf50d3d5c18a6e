import { ScheduledEvent } from 'aws-lambda';
import { BriefingReport } from '@/domain/briefing-report';
import { ConfigLoader, withLookbackHours } from '@/utils/config-loader';
import { buildBriefingService } from '@/command/build-briefing-service';
import { logger } from '@/utils/logger';

const configLoader = ConfigLoader.getInstance();

// Scheduled EventBridge events and manual invocations
interface DailyBriefingEvent extends Partial<ScheduledEvent> {
    lookback_hours?: number | string; // e.g. 72 after a long weekend
    detail?: {
        lookback_hours?: number | string;
    };
}

export const lambdaHandler = async (event: DailyBriefingEvent): Promise<BriefingReport> => {
    const lookbackHoursOverride = event.lookback_hours ?? event.detail?.lookback_hours;

    logger.info('Daily briefing Lambda triggered', {
        time: event.time,
        region: event.region,
        lookbackHoursOverride,
    });

    try {
        let config = configLoader.loadConfig();

        if (lookbackHoursOverride !== undefined) {
            logger.info('Overriding lookback_hours from event', {
                original: config.scan_config.lookback_hours,
                override: lookbackHoursOverride,
            });
            config = withLookbackHours(config, lookbackHoursOverride);
        }

        const report = await buildBriefingService(config).run();

        logger.info('Daily briefing finished', { ...report });
        return report;
    } catch (error) {
        logger.error('Daily briefing failed', {
            error: error instanceof Error ? error.message : String(error),
        });
        throw error;
    }
};
