import {
    deleteProfileRow,
    getProfileRow,
    insertProfileRow,
    listProfileRows,
    updateProfileRow,
    type ProfileRow,
} from './db.js';
import { ValidationError } from '../types/errors.js';
import type { Profile, ProfileData } from '../types/profile.js';
import { logThought } from '../utils/logger.js';

/** Named operator profiles (free-form settings such as default delays or target lists). */
export class ProfileStore {
    readonly #now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.#now = now;
    }

    /** Returns false when a profile with this name already exists. */
    create(name: string, data: ProfileData = {}): boolean {
        const key = requireName(name, 'Profile creation');
        const created = insertProfileRow(key, JSON.stringify(data), this.#now().toISOString());
        if (created) {
            void logThought(`[ProfileStore] Created profile '${key}'.`);
        }
        return created;
    }

    /** Returns false when no profile with this name exists. */
    update(name: string, data: ProfileData): boolean {
        const key = requireName(name, 'Profile update');
        const updated = updateProfileRow(key, JSON.stringify(data), this.#now().toISOString());
        if (updated) {
            void logThought(`[ProfileStore] Updated profile '${key}'.`);
        }
        return updated;
    }

    delete(name: string): boolean {
        const deleted = deleteProfileRow(name.trim());
        if (deleted) {
            void logThought(`[ProfileStore] Deleted profile '${name.trim()}'.`);
        }
        return deleted;
    }

    get(name: string): Profile | undefined {
        const row = getProfileRow(name.trim());
        return row ? toProfile(row) : undefined;
    }

    listNames(): string[] {
        return listProfileRows().map((row) => row.name);
    }

    list(): Profile[] {
        return listProfileRows().map(toProfile);
    }
}

function requireName(name: string, operation: string): string {
    const key = name.trim();
    if (!key) {
        throw new ValidationError(operation, ['Profile name must be a non-empty string.']);
    }
    return key;
}

function toProfile(row: ProfileRow): Profile {
    const parsed: unknown = JSON.parse(row.data_json);
    return {
        name: row.name,
        data: isRecord(parsed) ? parsed : {},
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

function isRecord(value: unknown): value is ProfileData {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
