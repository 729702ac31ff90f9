import { DocumentValidationError } from '../database/tracking.errors';

const USER_PREFIX = 'users/';

/**
 * Builds the upload key for a user: `users/<userId>/[<prefix>/]<fileName>`.
 * Spaces in the file name become underscores.
 */
export function buildUserObjectKey(userId: string, fileName: string, prefix?: string): string {
    if (!userId || userId.includes('/')) {
        throw new DocumentValidationError(`Invalid user id for upload key: '${userId}'`);
    }
    const name = fileName.trim().replace(/ /g, '_');
    if (!name || name.includes('/')) {
        throw new DocumentValidationError(`Invalid file name: '${fileName}'`);
    }

    const folder = (prefix ?? '').replace(/^\/+|\/+$/g, '');
    return folder ? `${USER_PREFIX}${userId}/${folder}/${name}` : `${USER_PREFIX}${userId}/${name}`;
}

/**
 * Reads the owner back out of a user-scoped upload key. Keys outside
 * `users/` belong to no one and yield null.
 */
export function userIdFromObjectKey(objectKey: string): string | null {
    if (!objectKey.startsWith(USER_PREFIX)) {
        return null;
    }
    const parts = objectKey.split('/');
    if (parts.length < 3 || !parts[1] || !parts[parts.length - 1]) {
        throw new DocumentValidationError(`Expected 'users/<userId>/<file>', got: ${objectKey}`);
    }
    return parts[1];
}
