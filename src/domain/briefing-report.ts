import { VoiceModelPackage } from './article';

export type VoiceConversionMode =
    | { kind: 'enabled'; model: VoiceModelPackage }
    | { kind: 'disabled' }
    | { kind: 'failed'; reason: string };

export interface BriefingReport {
    sourcesProcessed: number;
    delivered: number; // audio + text-only notices
    audioDelivered: number;
    textOnly: number;
    failed: number;
    voiceConversion: VoiceConversionMode['kind'];
}
