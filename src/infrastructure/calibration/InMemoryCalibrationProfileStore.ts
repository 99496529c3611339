import { ICalibrationProfileStore } from '../../domain/ports/ICalibrationProfileStore';
import { CalibrationProfile } from '../../domain/entities/CalibrationProfile';
import { Language } from '../../domain/entities/Language';

/**
 * In-memory profile store for development and testing.
 */
export class InMemoryCalibrationProfileStore implements ICalibrationProfileStore {
    private profiles: Map<string, CalibrationProfile> = new Map();

    constructor(initial: Record<string, CalibrationProfile> = {}) {
        Object.entries(initial).forEach(([key, profile]) => this.profiles.set(key, profile));
    }

    async load(key: string, language: Language): Promise<CalibrationProfile | null> {
        const profile = this.profiles.get(key);
        if (!profile || profile.language !== language) {
            return null;
        }
        return { ...profile };
    }

    async save(profile: CalibrationProfile, key: string): Promise<void> {
        this.profiles.set(key, { ...profile });
    }
}
