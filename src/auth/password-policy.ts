/**
 * Password strength rules applied at registration.
 */

export const MIN_PASSWORD_LENGTH = 8;
/** bcrypt ignores everything after this many bytes. */
export const MAX_PASSWORD_BYTES = 72;

export function exceedsHashInput(password: string): boolean {
    return Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES;
}

export interface PasswordCheck {
    ok: boolean;
    problems: string[];
}

export function checkPasswordStrength(password: string): PasswordCheck {
    const problems: string[] = [];
    if (password.length < MIN_PASSWORD_LENGTH) {
        problems.push(`must be at least ${MIN_PASSWORD_LENGTH} characters long`);
    }
    if (exceedsHashInput(password)) {
        problems.push(`must be at most ${MAX_PASSWORD_BYTES} bytes long`);
    }
    if (!/[A-Z]/.test(password)) {
        problems.push('must contain an uppercase letter');
    }
    if (!/[0-9]/.test(password)) {
        problems.push('must contain a digit');
    }
    return { ok: problems.length === 0, problems };
}
