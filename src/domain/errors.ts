export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export class ModelDownloadError extends Error {
    constructor(
        message: string,
        public readonly status?: number,
    ) {
        super(message);
        this.name = 'ModelDownloadError';
    }
}

export class ModelNotFoundError extends Error {
    constructor(message = 'Voice model not found in archive') {
        super(message);
        this.name = 'ModelNotFoundError';
    }
}

export class SynthesisError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SynthesisError';
    }
}

export class VoiceConversionError extends Error {
    constructor(
        message: string,
        public readonly step: string,
    ) {
        super(message);
        this.name = 'VoiceConversionError';
    }
}

export class DeliveryError extends Error {
    constructor(
        message: string,
        public readonly status?: number,
    ) {
        super(message);
        this.name = 'DeliveryError';
    }
}
