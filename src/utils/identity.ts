/**
 * src/utils/identity.ts
 *
 * Client identity material derived from a pooled resource.
 *
 * Everything here is a pure function of its inputs: randomness comes from a
 * SHA-256 stream seeded by (resource id, time bucket), so one identity keeps
 * a stable device id and session for a whole rotation bucket and every
 * process derives the same values.
 *
 * The values are shaped like the real thing (a 15-digit Luhn-valid IMEI, a
 * 40-hex iOS UDID, an MD5 request signature) but nothing here reproduces a
 * target's actual signing protocol. They are best-effort mimicry only and
 * carry no guarantee of passing server-side verification.
 */

import { createHash } from 'crypto';
import type { CookieField, IdentityPolicy } from '../config/sources.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type DevicePlatform = 'android' | 'ios' | 'pc';

export interface ClientIdentity {
    userAgent: string;
    platform: DevicePlatform;
    deviceId: string;
    sessionId: string;
    forwardedFor: string;
    /** Start of the rotation bucket this identity belongs to. */
    issuedAt: number;
}

export interface RequestSignature {
    timestamp: number;
    sign: string;
}

// ─── Device catalogue ─────────────────────────────────────────────────────────

const ANDROID_DEVICES: ReadonlyArray<readonly [string, string]> = [
    ['xiaomi', 'MI 14'],
    ['huawei', 'Mate 60'],
    ['oppo', 'Reno 10'],
    ['vivo', 'X100'],
    ['samsung', 'Galaxy S23'],
];

const IOS_MODELS = ['iPhone15,2', 'iPhone14,5', 'iPhone13,1'] as const;

const ALPHABETS = {
    hex: '0123456789abcdef',
    alnum: 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789',
    digits: '0123456789',
} as const;

// ─── Hash stream ──────────────────────────────────────────────────────────────

/** Deterministic byte source: sha256(seed:0), sha256(seed:1), ... */
export class HashStream {
    private buffer: Buffer = Buffer.alloc(0);
    private offset = 0;
    private counter = 0;

    constructor(private readonly seed: string) {}

    private nextByte(): number {
        if (this.offset >= this.buffer.length) {
            this.buffer = createHash('sha256').update(`${this.seed}:${this.counter++}`).digest();
            this.offset = 0;
        }
        return this.buffer[this.offset++] ?? 0;
    }

    /** Uniform-enough integer in [0, max). */
    int(max: number): number {
        const value = (this.nextByte() << 16) | (this.nextByte() << 8) | this.nextByte();
        return value % max;
    }

    pick<T>(items: readonly T[]): T {
        const item = items[this.int(items.length)];
        if (item === undefined) throw new RangeError('pick() from an empty list');
        return item;
    }

    chars(alphabet: string, length: number): string {
        let out = '';
        for (let i = 0; i < length; i++) out += alphabet.charAt(this.int(alphabet.length));
        return out;
    }
}

// ─── Generators ───────────────────────────────────────────────────────────────

export function luhnCheckDigit(digits: string): number {
    let sum = 0;
    for (let i = 0; i < digits.length; i++) {
        let d = Number(digits.charAt(digits.length - 1 - i));
        if (i % 2 === 0) {
            d *= 2;
            if (d > 9) d -= 9;
        }
        sum += d;
    }
    return (10 - (sum % 10)) % 10;
}

export function generateImei(stream: HashStream): string {
    const body = String(1 + stream.int(9)) + stream.chars(ALPHABETS.digits, 13);
    return body + String(luhnCheckDigit(body));
}

export function platformOf(userAgent: string): DevicePlatform {
    if (/iPhone|iPad|iOS/i.test(userAgent)) return 'ios';
    if (/Android/i.test(userAgent)) return 'android';
    return 'pc';
}

export function generateDeviceId(platform: DevicePlatform, stream: HashStream): string {
    switch (platform) {
        case 'android': {
            const [brand, model] = stream.pick(ANDROID_DEVICES);
            return `${brand}_${model}_${generateImei(stream)}`;
        }
        case 'ios':
            return `Apple_${stream.pick(IOS_MODELS)}_${stream.chars(ALPHABETS.hex, 40).toUpperCase()}`;
        case 'pc':
            return `PC_${stream.chars(ALPHABETS.hex, 16)}`;
    }
}

export function generateSessionId(prefix: string, issuedAt: number, stream: HashStream): string {
    return `${prefix}_${issuedAt}_${stream.chars(ALPHABETS.hex, 16)}`;
}

/** A public-looking IPv4 address (first octet 1–223, never 10/127/172/192). */
export function generateForwardedFor(stream: HashStream): string {
    let first = 1 + stream.int(223);
    while (first === 10 || first === 127 || first === 172 || first === 192) first = 1 + stream.int(223);
    return [first, stream.int(256), stream.int(256), 1 + stream.int(254)].join('.');
}

/**
 * MD5 over the parameters sorted by name, then timestamp and salt:
 *   md5("keyword=手机&page=1&timestamp=...&salt=...")
 */
export function signRequest(
    params: Record<string, string | number>,
    salt: string,
    timestamp: number,
): RequestSignature {
    const canonical = Object.keys(params)
        .sort()
        .map((key) => `${key}=${params[key]}`)
        .concat(`timestamp=${timestamp}`, `salt=${salt}`)
        .join('&');
    return { timestamp, sign: createHash('md5').update(canonical, 'utf8').digest('hex') };
}

/** "name=value; name=value" from a cookie template. */
export function buildCookieHeader(fields: readonly CookieField[], seed: string): string {
    const stream = new HashStream(`cookie:${seed}`);
    return fields.map((f) => `${f.name}=${f.prefix}${stream.chars(ALPHABETS[f.alphabet], f.length)}`).join('; ');
}

/** Derives the full identity for a pooled user agent at `now`. */
export function buildClientIdentity(
    resource: { id: string; value: string },
    now: number,
    policy: Pick<IdentityPolicy, 'rotateMs' | 'sessionPrefix'>,
): ClientIdentity {
    const bucket = Math.floor(now / policy.rotateMs);
    const issuedAt = bucket * policy.rotateMs;
    const stream = new HashStream(`${resource.id}:${bucket}`);
    const platform = platformOf(resource.value);
    return {
        userAgent: resource.value,
        platform,
        deviceId: generateDeviceId(platform, stream),
        sessionId: generateSessionId(policy.sessionPrefix, issuedAt, stream),
        forwardedFor: generateForwardedFor(stream),
        issuedAt,
    };
}

/** Picks the signing salt for an identity; stable within its bucket. */
export function pickSalt(salts: readonly string[], identity: ClientIdentity): string | null {
    if (salts.length === 0) return null;
    return new HashStream(`salt:${identity.deviceId}`).pick(salts);
}
