/**
 * Certificate Settings — `apiweave cert`
 *
 * Prepares what an ACME client needs to obtain certificates for the
 * project's domains:
 *
 *   config/acme.toml        domains, contact, directory URL, cache dir
 *   certs/account.key.pem   EC P-256 account key (PKCS#8)
 *
 * Existing files are left alone. The ACME exchange itself is not
 * performed here.
 *
 * @module
 */
import { generateKeyPairSync } from 'node:crypto';
import { stringify as stringifyToml } from 'smol-toml';
import { z } from 'zod';
import { ProjectIOError } from '@apiweave/engine';
import { ConfigError } from '../config/ConfigLoader.js';
import { readOptional, writeProjectFile } from '../scaffold/ProjectFiles.js';

export const ACME_DIRECTORY_URL = 'https://acme-v02.api.letsencrypt.org/directory';
export const ACME_STAGING_DIRECTORY_URL = 'https://acme-staging-v02.api.letsencrypt.org/directory';

export const ACME_CONFIG_PATH = 'config/acme.toml';
export const ACCOUNT_KEY_PATH = 'certs/account.key.pem';
const CACHE_DIR = 'certs';

const HOSTNAME = /^(\*\.)?([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;

const CERT_OPTIONS = z.object({
    domains: z.array(z.string().toLowerCase().regex(HOSTNAME, 'not a valid domain name')).min(1, 'at least one --domain is required'),
    email: z.string().email('not a valid email address'),
    staging: z.boolean().default(false),
});

export type CertOptions = z.input<typeof CERT_OPTIONS>;

export interface CertResult {
    /** Project-relative paths written */
    readonly created: readonly string[];
    /** Project-relative paths left as they were */
    readonly existing: readonly string[];
}

/**
 * Write the ACME settings and account key for `projectDir`.
 *
 * @throws {ConfigError} When a domain or the email is invalid
 * @throws {ProjectIOError} When a file cannot be read or written
 */
export async function provisionCertificateSettings(projectDir: string, options: CertOptions): Promise<CertResult> {
    const parsed = CERT_OPTIONS.safeParse(options);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new ConfigError('cert', `${where}${issue?.message ?? 'invalid options'}`);
    }
    const settings = parsed.data;

    const created: string[] = [];
    const existing: string[] = [];

    const files: [string, () => string][] = [
        [ACME_CONFIG_PATH, () => acmeToml(settings.domains, settings.email, settings.staging)],
        [ACCOUNT_KEY_PATH, generateAccountKey],
    ];

    for (const [path, render] of files) {
        let current: string | undefined;
        try {
            current = await readOptional(projectDir, path);
        } catch (err) {
            throw new ProjectIOError(path, 'read', err);
        }
        if (current !== undefined) {
            existing.push(path);
            continue;
        }
        await writeProjectFile(projectDir, path, render());
        created.push(path);
    }

    return { created, existing };
}

/** PKCS#8 PEM of a fresh EC P-256 private key */
export function generateAccountKey(): string {
    const { privateKey } = generateKeyPairSync('ec', {
        namedCurve: 'P-256',
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });
    return privateKey;
}

export function acmeToml(domains: readonly string[], email: string, staging: boolean): string {
    const settings = {
        domains: [...domains],
        contact: [`mailto:${email}`],
        directory_url: staging ? ACME_STAGING_DIRECTORY_URL : ACME_DIRECTORY_URL,
        staging,
        cache_dir: CACHE_DIR,
        account_key: ACCOUNT_KEY_PATH,
    };
    return `# ACME account settings\n${stringifyToml(settings)}`;
}
