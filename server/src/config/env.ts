import dotenv from 'dotenv';

dotenv.config();

export interface EnvConfig {
    openaiApiKey: string | undefined;
    googleApiKey: string | undefined;
    mapsEmbedApiKey: string | undefined;
}

function readKey(name: string): string | undefined {
    const value = process.env[name]?.trim();
    return value ? value : undefined;
}

export function getConfig(): EnvConfig {
    return {
        openaiApiKey: readKey('OPENAI_API_KEY'),
        googleApiKey: readKey('GOOGLE_API_KEY'),
        // Embed key falls back to the Places key when both APIs are enabled on one key
        mapsEmbedApiKey: readKey('GOOGLE_MAPS_EMBED_KEY') ?? readKey('GOOGLE_API_KEY')
    };
}
