import type { ProfileStore } from '../services/profile-store.js';
import type { ProfileData } from '../types/profile.js';
import { ValidationError } from '../types/errors.js';

const USAGE = 'Usage: relaydesk profile <list|show|create|update|delete> [name] [json]';

function parseData(raw: string | undefined): ProfileData {
    if (raw === undefined) return {};
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new ValidationError('Profile data', ['Data must be valid JSON.']);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ValidationError('Profile data', ['Data must be a JSON object.']);
    }
    return Object.fromEntries(Object.entries(parsed));
}

/**
 * Handle the `profile` command.
 * Returns `true` when the command was recognized and handled.
 */
export function handleProfileCli(argv: string[], store: ProfileStore): boolean {
    if (argv[0] !== 'profile') return false;

    const [, subcommand, name, rawData] = argv;
    const asJson = argv.includes('--json');

    try {
        switch (subcommand) {
            case 'list': {
                const profiles = store.list();
                if (asJson) {
                    console.log(JSON.stringify(profiles, null, 2));
                } else if (profiles.length === 0) {
                    console.log('No profiles stored.');
                } else {
                    for (const profile of profiles) {
                        console.log(`${profile.name}  (updated ${profile.updatedAt})`);
                    }
                }
                process.exitCode = 0;
                return true;
            }
            case 'show': {
                const profile = store.get(name ?? '');
                if (!profile) {
                    console.error(`[RelayDesk] Profile '${name ?? ''}' not found.`);
                    process.exitCode = 1;
                    return true;
                }
                console.log(JSON.stringify(profile, null, 2));
                process.exitCode = 0;
                return true;
            }
            case 'create': {
                const created = store.create(name ?? '', parseData(rawData));
                console.log(created ? `Profile '${name}' created.` : `Profile '${name}' already exists.`);
                process.exitCode = created ? 0 : 1;
                return true;
            }
            case 'update': {
                const updated = store.update(name ?? '', parseData(rawData));
                console.log(updated ? `Profile '${name}' updated.` : `Profile '${name}' not found.`);
                process.exitCode = updated ? 0 : 1;
                return true;
            }
            case 'delete': {
                const deleted = store.delete(name ?? '');
                console.log(deleted ? `Profile '${name}' deleted.` : `Profile '${name}' not found.`);
                process.exitCode = deleted ? 0 : 1;
                return true;
            }
            default:
                console.error(USAGE);
                process.exitCode = 1;
                return true;
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[RelayDesk] ${message}`);
        process.exitCode = 1;
        return true;
    }
}
