import fs from 'fs';
import fsPromises from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileCalibrationProfileStore } from '../../../src/infrastructure/calibration/FileCalibrationProfileStore';
import { InMemoryCalibrationProfileStore } from '../../../src/infrastructure/calibration/InMemoryCalibrationProfileStore';
import { CalibrationProfile, createDefaultProfile } from '../../../src/domain/entities/CalibrationProfile';

const thaiProfile: CalibrationProfile = {
    ...createDefaultProfile('th', new Date('2025-02-01T08:00:00.000Z')),
    charsPerSecond: 12.4,
    sampleCount: 14,
    voiceType: 'narrator-a',
};

describe('FileCalibrationProfileStore', () => {
    let tempDir: string;
    let filePath: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'profiles-test-'));
        filePath = path.join(tempDir, 'nested', 'profiles.json');
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    it('returns null when nothing is stored', async () => {
        const store = new FileCalibrationProfileStore(filePath);
        await expect(store.load('default', 'th')).resolves.toBeNull();
    });

    it('saves and loads a profile by key', async () => {
        const store = new FileCalibrationProfileStore(filePath);

        await store.save(thaiProfile, 'narrator');

        await expect(store.load('narrator', 'th')).resolves.toEqual(thaiProfile);
        expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual({ narrator: thaiProfile });
    });

    it('keeps other keys when saving', async () => {
        const store = new FileCalibrationProfileStore(filePath);
        const english = createDefaultProfile('en', new Date('2025-02-01T08:00:00.000Z'));

        await store.save(thaiProfile, 'thai');
        await store.save(english, 'english');

        await expect(store.load('thai', 'th')).resolves.toEqual(thaiProfile);
        await expect(store.load('english', 'en')).resolves.toEqual(english);
    });

    it('treats a missing-file error without an Error prototype as an empty document', async () => {
        jest.spyOn(fsPromises, 'readFile').mockRejectedValueOnce({ code: 'ENOENT', message: 'no such file' });
        const store = new FileCalibrationProfileStore(filePath);

        await store.save(thaiProfile, 'narrator');

        expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual({ narrator: thaiProfile });
    });

    it('rethrows other read errors on save', async () => {
        jest.spyOn(fsPromises, 'readFile').mockRejectedValueOnce({ code: 'EACCES', message: 'permission denied' });
        const store = new FileCalibrationProfileStore(filePath);

        await expect(store.save(thaiProfile, 'narrator')).rejects.toEqual({ code: 'EACCES', message: 'permission denied' });
    });

    it('treats a profile for another language as absent', async () => {
        const store = new FileCalibrationProfileStore(filePath);
        await store.save(thaiProfile, 'narrator');

        await expect(store.load('narrator', 'en')).resolves.toBeNull();
        expect(console.warn).toHaveBeenCalledWith("[Calibration] Profile 'narrator' is for 'th', not 'en'");
    });

    it('fills descriptive fields missing from older documents', async () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, JSON.stringify({
            legacy: {
                charsPerSecond: 9.5,
                wordsPerSecond: 2.5,
                language: 'th',
                sampleCount: 3,
                calibratedAt: '2024-12-01T00:00:00.000Z',
            },
        }));
        const store = new FileCalibrationProfileStore(filePath);

        const profile = await store.load('legacy', 'th');

        expect(profile).toEqual({
            charsPerSecond: 9.5,
            wordsPerSecond: 2.5,
            language: 'th',
            sampleCount: 3,
            calibratedAt: '2024-12-01T00:00:00.000Z',
            voiceType: 'unknown',
            speakingRate: 1,
        });
    });

    it('ignores a document that is not valid JSON', async () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, '{ not json');
        const store = new FileCalibrationProfileStore(filePath);

        await expect(store.load('default', 'th')).resolves.toBeNull();
        expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('ignores a document that fails validation', async () => {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, JSON.stringify({ default: { charsPerSecond: -1, language: 'th' } }));
        const store = new FileCalibrationProfileStore(filePath);

        await expect(store.load('default', 'th')).resolves.toBeNull();

        await store.save(thaiProfile, 'default');
        await expect(store.load('default', 'th')).resolves.toEqual(thaiProfile);
    });
});

describe('InMemoryCalibrationProfileStore', () => {
    it('stores copies by key and language', async () => {
        const store = new InMemoryCalibrationProfileStore({ seeded: thaiProfile });

        const loaded = await store.load('seeded', 'th');
        expect(loaded).toEqual(thaiProfile);
        expect(loaded).not.toBe(thaiProfile);
        await expect(store.load('seeded', 'en')).resolves.toBeNull();

        await store.save({ ...thaiProfile, charsPerSecond: 9 }, 'seeded');
        await expect(store.load('seeded', 'th')).resolves.toMatchObject({ charsPerSecond: 9 });
    });
});
