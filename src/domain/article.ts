export interface Article {
    title: string;
    link: string;
    body: string;
    publishedAt: Date;
}

export type Synopsis = string;

export type AudioEncoding = 'speech' | 'converted';

export interface AudioArtifact {
    path: string;
    encoding: AudioEncoding;
}

export interface VoiceModelPackage {
    weightsPath: string;
    indexPath: string | null;
}
