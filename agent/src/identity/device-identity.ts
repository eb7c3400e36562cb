import {
	type KeyObject,
	createHash,
	createPrivateKey,
	createPublicKey,
	generateKeyPairSync,
	sign,
} from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { IdentityNotInitializedError, errorMessage } from "../errors.js";
import { type NodeLogger, nullLogger } from "../logger.js";

export const KEY_FILE_NAME = "device-key-ed25519.json";

/** PKCS#8 DER header for a raw 32-byte Ed25519 private key */
const ED25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");

const KeyRecordSchema = z.object({
	privateKeyBase64: z.string().min(1),
	publicKeyBase64: z.string().optional(),
	deviceId: z.string().optional(),
	deviceToken: z.string().nullable().optional(),
	algorithm: z.literal("Ed25519").default("Ed25519"),
	createdAt: z.number().int().nonnegative().default(0),
});

/** On-disk shape of the device key file */
export type DeviceKeyRecord = z.output<typeof KeyRecordSchema>;

interface LoadedKey {
	privateKey: KeyObject;
	publicKeyRaw: Buffer;
	deviceId: string;
	record: DeviceKeyRecord;
}

export function deriveDeviceId(publicKeyRaw: Buffer): string {
	return createHash("sha256").update(publicKeyRaw).digest("hex");
}

function importPrivateKey(raw: Buffer): KeyObject {
	if (raw.length !== 32) {
		throw new Error(`Expected 32-byte Ed25519 key, got ${raw.length} bytes`);
	}
	return createPrivateKey({
		key: Buffer.concat([ED25519_PKCS8_PREFIX, raw]),
		format: "der",
		type: "pkcs8",
	});
}

function rawPublicKey(privateKey: KeyObject): Buffer {
	const jwk = createPublicKey(privateKey).export({ format: "jwk" });
	if (typeof jwk.x !== "string") {
		throw new Error("Public key export did not yield a raw key");
	}
	return Buffer.from(jwk.x, "base64url");
}

function rawPrivateKey(privateKey: KeyObject): Buffer {
	const jwk = privateKey.export({ format: "jwk" });
	if (typeof jwk.d !== "string") {
		throw new Error("Private key export did not yield a raw key");
	}
	return Buffer.from(jwk.d, "base64url");
}

/**
 * Ed25519 device identity persisted in `<dataDir>/device-key-ed25519.json`.
 *
 * The device id is sha256 of the raw public key in lowercase hex. The key
 * file is rewritten whole whenever the gateway issues a device token.
 */
export class IdentityStore {
	readonly keyPath: string;
	private readonly logger: NodeLogger;
	private privateKey: KeyObject | null = null;
	private publicKeyRaw: Buffer | null = null;
	private _deviceId: string | null = null;
	private _deviceToken: string | null = null;
	private record: DeviceKeyRecord | null = null;
	private _source: "loaded" | "generated" | null = null;

	constructor(dataDir: string, logger: NodeLogger = nullLogger) {
		this.keyPath = path.join(dataDir, KEY_FILE_NAME);
		this.logger = logger;
	}

	get deviceId(): string {
		if (!this._deviceId) throw new IdentityNotInitializedError();
		return this._deviceId;
	}

	/** Raw public key, unpadded base64url */
	get publicKey(): string {
		if (!this.publicKeyRaw) throw new IdentityNotInitializedError();
		return this.publicKeyRaw.toString("base64url");
	}

	get shortDeviceId(): string {
		return this.deviceId.slice(0, 16);
	}

	get deviceToken(): string | null {
		return this._deviceToken;
	}

	get isInitialized(): boolean {
		return this._deviceId !== null;
	}

	/** Whether the last initialize() reused the key file or minted a new key */
	get source(): "loaded" | "generated" | null {
		return this._source;
	}

	initialize(): void {
		const loaded = fs.existsSync(this.keyPath) ? this.loadExisting() : null;
		if (loaded) {
			this.adopt(loaded);
			this._source = "loaded";
			this.logger.info(`Loaded Ed25519 device identity: ${this.shortDeviceId}...`);
			return;
		}
		this.generateNew();
		this._source = "generated";
	}

	buildSignaturePayload(
		nonce: string,
		signedAtMs: number,
		clientId: string,
		authToken: string,
	): string {
		// role and scopes sit between "node" and signedAtMs; scopes stay empty
		return [
			"v2",
			this.deviceId,
			clientId,
			"node",
			"node",
			"",
			String(signedAtMs),
			authToken,
			nonce,
		].join("|");
	}

	/**
	 * Sign the connect payload. `authToken` is the connect request's
	 * auth.token, never the stored device token.
	 */
	signPayload(
		nonce: string,
		signedAtMs: number,
		clientId: string,
		authToken: string,
	): string {
		if (!this.privateKey) throw new IdentityNotInitializedError();
		const payload = this.buildSignaturePayload(nonce, signedAtMs, clientId, authToken);
		return sign(null, Buffer.from(payload, "utf8"), this.privateKey).toString("base64url");
	}

	storeDeviceToken(token: string): void {
		this._deviceToken = token;
		if (!this.record) {
			this.logger.warn("Device token kept in memory only: identity not initialized");
			return;
		}
		this.record = { ...this.record, deviceToken: token };
		if (this.persist(this.record)) {
			this.logger.info("Device token stored");
		}
	}

	private loadExisting(): LoadedKey | null {
		try {
			const parsed = KeyRecordSchema.safeParse(
				JSON.parse(fs.readFileSync(this.keyPath, "utf-8")),
			);
			if (!parsed.success) {
				this.logger.warn("Invalid device key file, generating new", {
					issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
				});
				return null;
			}
			const record = parsed.data;
			const privateKey = importPrivateKey(Buffer.from(record.privateKeyBase64, "base64"));
			const publicKeyRaw = rawPublicKey(privateKey);
			const deviceId = deriveDeviceId(publicKeyRaw);
			if (record.deviceId !== deviceId) {
				this.logger.warn("Stored device id does not match key, rewriting");
				const repaired: DeviceKeyRecord = {
					...record,
					publicKeyBase64: publicKeyRaw.toString("base64"),
					deviceId,
				};
				this.persist(repaired);
				return { privateKey, publicKeyRaw, deviceId, record: repaired };
			}
			return { privateKey, publicKeyRaw, deviceId, record };
		} catch (err) {
			this.logger.error("Failed to load device key", { error: errorMessage(err) });
			return null;
		}
	}

	private generateNew(): void {
		this.logger.info("Generating new Ed25519 device keypair...");
		const { privateKey } = generateKeyPairSync("ed25519");
		const publicKeyRaw = rawPublicKey(privateKey);
		const deviceId = deriveDeviceId(publicKeyRaw);
		const record: DeviceKeyRecord = {
			privateKeyBase64: rawPrivateKey(privateKey).toString("base64"),
			publicKeyBase64: publicKeyRaw.toString("base64"),
			deviceId,
			deviceToken: null,
			algorithm: "Ed25519",
			createdAt: Date.now(),
		};
		this.adopt({ privateKey, publicKeyRaw, deviceId, record });
		this.persist(record);
		this.logger.info(`Generated new Ed25519 device identity: ${deviceId}`);
	}

	private adopt(key: LoadedKey): void {
		this.privateKey = key.privateKey;
		this.publicKeyRaw = key.publicKeyRaw;
		this._deviceId = key.deviceId;
		this._deviceToken = key.record.deviceToken ?? null;
		this.record = key.record;
	}

	/** Write via temp file + rename; failures are logged, never thrown */
	private persist(record: DeviceKeyRecord): boolean {
		const tmpPath = `${this.keyPath}.tmp`;
		try {
			fs.mkdirSync(path.dirname(this.keyPath), { recursive: true });
			fs.writeFileSync(tmpPath, `${JSON.stringify(record, null, 2)}\n`, {
				mode: 0o600,
			});
			fs.renameSync(tmpPath, this.keyPath);
			return true;
		} catch (err) {
			this.logger.error("Failed to persist device key", {
				path: this.keyPath,
				error: errorMessage(err),
			});
			return false;
		}
	}
}
