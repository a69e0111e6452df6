import { expect } from "vitest";
import type { RadioLink, RadioLinkEndpoint } from "../src/drivers/radio-link.js";
import {
    deriveSessionKey,
    encryptPairingProof,
    reverseMACAddress,
    TelinkConsts,
    TelinkMeshError,
    type TelinkMeshErrorCode,
} from "../src/telink/telink.js";
import {
    decodeCommandFrame,
    decryptCommandFrame,
    encodeNotificationFrame,
    encryptNotificationFrame,
    type TelinkCommandFrame,
    verifyCommandFrame,
} from "../src/telink/telink-frame.js";

export const DEVICE_ADDRESS = "AA:BB:CC:DD:EE:FF";
export const DEVICE_NAME = "Device1";
export const DEVICE_PASSWORD = "pass1234";
export const NONCE_LOCAL = Buffer.alloc(8, 0x00);
export const NONCE_REMOTE = Buffer.alloc(8, 0xff);
/** session key for the above, see telink.test.ts */
export const SESSION_KEY = Buffer.from("8f1f48fd78dbc120f59ddb23aa7379d7", "hex");
export const REVERSED_ADDRESS = Buffer.from([0xff, 0xee, 0xdd, 0xcc, 0xbb, 0xaa]);

export type MockHandle = { id: number; address: string };

/** Helper asserting `fn` throws a `TelinkMeshError` with the given code */
export function expectErrorCode(fn: () => unknown, code: TelinkMeshErrorCode): void {
    let thrown: unknown;

    try {
        fn();
    } catch (error) {
        thrown = error;
    }

    expect(thrown).toBeInstanceOf(TelinkMeshError);
    expect(thrown instanceof TelinkMeshError ? thrown.code : undefined).toStrictEqual(code);
}

/** Helper to create a 10-byte report payload */
export function createPayload(bytes: number[]): Buffer {
    const payload = Buffer.alloc(10);

    payload.set(bytes, 0);

    return payload;
}

/**
 * In-process stand-in for a radio link connected to a single mesh device.
 * The device side checks pairing proofs, decrypts command frames and can emit encrypted notifications.
 */
export class MockRadioLink implements RadioLink<MockHandle> {
    public readonly writes: { endpoint: RadioLinkEndpoint; data: Buffer }[] = [];
    /** decrypted command frames, with check validity */
    public readonly commands: { frame: TelinkCommandFrame; checkValid: boolean }[] = [];
    public connectCount = 0;
    public disconnectCount = 0;
    /** when set, `write` to this endpoint rejects */
    public failWritesTo: RadioLinkEndpoint | undefined;
    /** when set, `read` of the pair endpoint returns this instead of the computed reply */
    public pairReplyOverride: Buffer | undefined;
    /** when set, `disconnect` rejects after releasing the device */
    public failDisconnect = false;

    #nextId = 1;
    #pairReply: Buffer = Buffer.alloc(0);
    #sessionKey: Buffer | undefined;
    #notificationSequence = 0x000100;
    readonly #subscribers = new Map<RadioLinkEndpoint, (data: Buffer) => void>();
    readonly #reversedAddress: Buffer;

    constructor(
        public readonly address = DEVICE_ADDRESS,
        private readonly name = DEVICE_NAME,
        private readonly password = DEVICE_PASSWORD,
        private readonly deviceNonce = NONCE_REMOTE,
        public deviceMeshAddress = 5,
    ) {
        this.#reversedAddress = reverseMACAddress(address);
    }

    get sessionKey(): Buffer | undefined {
        return this.#sessionKey;
    }

    get subscribed(): boolean {
        return this.#subscribers.has("notify");
    }

    async connect(address: string): Promise<MockHandle> {
        this.connectCount += 1;

        return await Promise.resolve({ id: this.#nextId++, address });
    }

    async disconnect(_handle: MockHandle): Promise<void> {
        this.disconnectCount += 1;
        this.#sessionKey = undefined;

        await Promise.resolve();

        if (this.failDisconnect) {
            throw new Error("Disconnect failed");
        }
    }

    async write(_handle: MockHandle, endpoint: RadioLinkEndpoint, data: Buffer): Promise<void> {
        await Promise.resolve();

        if (this.failWritesTo === endpoint) {
            throw new Error(`Write to ${endpoint} failed`);
        }

        this.writes.push({ endpoint, data: Buffer.from(data) });

        if (endpoint === "pair") {
            this.onPairRequest(data);
        } else if (endpoint === "command" && this.#sessionKey) {
            const cleartext = decryptCommandFrame(this.#sessionKey, this.#reversedAddress, data);

            this.commands.push({
                frame: decodeCommandFrame(cleartext),
                checkValid: verifyCommandFrame(this.#sessionKey, this.#reversedAddress, cleartext),
            });
        }
    }

    async read(_handle: MockHandle, endpoint: RadioLinkEndpoint): Promise<Buffer> {
        await Promise.resolve();

        if (endpoint !== "pair") {
            return Buffer.alloc(0);
        }

        return this.pairReplyOverride ?? this.#pairReply;
    }

    subscribe(_handle: MockHandle, endpoint: RadioLinkEndpoint, callback: (data: Buffer) => void): () => void {
        this.#subscribers.set(endpoint, callback);

        return () => {
            this.#subscribers.delete(endpoint);
        };
    }

    /**
     * Emit a report from the device, encrypted with the current session key.
     */
    notify(command: number, payload: Buffer, vendor: number = TelinkConsts.DEFAULT_VENDOR): void {
        if (!this.#sessionKey) {
            throw new Error("Device not paired");
        }

        const cleartext = encodeNotificationFrame({
            sequence: this.#notificationSequence++,
            source: this.deviceMeshAddress,
            check: 0,
            command,
            vendor,
            payload,
        });

        this.emitRaw(encryptNotificationFrame(this.#sessionKey, this.#reversedAddress, cleartext));
    }

    emitRaw(data: Buffer): void {
        this.#subscribers.get("notify")?.(data);
    }

    private onPairRequest(data: Buffer): void {
        const nonceLocal = data.subarray(1, 9);
        const expectedProof = encryptPairingProof(this.name, this.password, nonceLocal).subarray(0, 8);

        if (data[0] === TelinkConsts.PAIR_REQUEST && expectedProof.equals(data.subarray(9, 17))) {
            this.#sessionKey = deriveSessionKey(this.name, this.password, Buffer.from(nonceLocal), this.deviceNonce);
            this.#pairReply = Buffer.concat([Buffer.from([TelinkConsts.PAIR_ACCEPTED]), this.deviceNonce]);
        } else {
            this.#sessionKey = undefined;
            this.#pairReply = Buffer.from([TelinkConsts.PAIR_REJECTED]);
        }
    }
}
