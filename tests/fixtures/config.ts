import { Config } from '../../src/config';

export const testConfig: Config = {
    port: 3000,
    environment: 'test',
    defaultLanguage: 'th',
    maxSceneSeconds: 8,
    minSceneSeconds: 7,
    mergeToleranceSeconds: 2,
    breakSearchWindow: 5,
    driftThresholdSeconds: 1,
    calibrationProfilePath: './data/test_profiles.json',
    transcriptionBackend: 'none',
    transcriptionModel: '',
    openaiApiKey: '',
    groqApiKey: '',
    localWhisperUrl: 'http://localhost:9000',
};
