import { CalibrationProfile } from '../entities/CalibrationProfile';
import { Language } from '../entities/Language';

/**
 * ICalibrationProfileStore - Port for persisted speaking-rate profiles, keyed by name.
 * Implementations: FileCalibrationProfileStore, InMemoryCalibrationProfileStore
 */
export interface ICalibrationProfileStore {
    /**
     * Returns the stored profile for the key, or null when none is stored for that language.
     * Callers substitute the default profile themselves.
     */
    load(key: string, language: Language): Promise<CalibrationProfile | null>;

    /** Stores the profile under the key, replacing any previous one. */
    save(profile: CalibrationProfile, key: string): Promise<void>;
}
