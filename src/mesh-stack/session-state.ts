import {
    combineNameAndPassword,
    deriveSessionKey,
    makePairingRequest,
    reverseMACAddress,
    TelinkConsts,
    TelinkMeshError,
    TelinkMeshErrorCode,
} from "../telink/telink.js";
import { decryptNotificationFrame, encryptCommandFrame } from "../telink/telink-frame.js";
import { logger } from "../utils/logger.js";

const NS = "session-state";

/**
 * Connection parameters for a single mesh device.
 */
export type MeshParameters = {
    /** MAC address, AA:BB:CC:DD:EE:FF */
    address: string;
    /** mesh name, max 16 bytes */
    name: string;
    /** mesh password, max 16 bytes */
    password: string;
    /** uint16_t, defaults to Telink's */
    vendor?: number;
    /** last known mesh address of the device, 0 if unknown */
    meshAddress?: number;
};

/**
 * Any value fitting the 16-bit destination field (0 when unknown)
 */
export function isMeshAddressField(meshAddress: number): boolean {
    return Number.isInteger(meshAddress) && meshAddress >= 0 && meshAddress <= 0xffff;
}

/**
 * @returns reversed address and vendor, resolved
 * @throws TelinkMeshError on invalid address, credentials, vendor or mesh address
 */
export function validateMeshParameters(params: MeshParameters): [reversedAddress: Buffer, vendor: number] {
    const reversedAddress = reverseMACAddress(params.address);
    const vendor = params.vendor ?? TelinkConsts.DEFAULT_VENDOR;

    // throws on invalid lengths
    combineNameAndPassword(params.name, params.password);

    if (!Number.isInteger(vendor) || vendor < 0 || vendor > 0xffff) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_CREDENTIALS, `Invalid vendor code ${vendor}`);
    }

    if (params.meshAddress !== undefined && !isMeshAddressField(params.meshAddress)) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_MESH_ADDRESS, `Invalid mesh address ${params.meshAddress}`);
    }

    return [reversedAddress, vendor];
}

/** Outgoing counter is 16-bit, wraps to zero */
const SEQUENCE_MASK = 0xffff;

/**
 * Protocol state of one connection: identity, session key, sequence counter, addressing.
 * Holds no transport state.
 *
 * Every mutation is synchronous, so a build or a dispatch always sees (and leaves) a consistent key/counter pair.
 */
export class SessionState {
    #address = "";
    #reversedAddress: Buffer = Buffer.alloc(TelinkConsts.MAC_ADDRESS_SIZE);
    #name = "";
    #password = "";
    #vendor: number = TelinkConsts.DEFAULT_VENDOR;

    #sessionKey: Buffer | undefined;
    #sequence = 1;

    #meshAddress = 0;
    readonly #groups = new Set<number>();

    constructor(params: MeshParameters) {
        this.setIdentity(params);
    }

    // #region Getters/Setters

    get address(): string {
        return this.#address;
    }

    /** copy, safe to mutate */
    get reversedAddress(): Buffer {
        return Buffer.from(this.#reversedAddress);
    }

    get name(): string {
        return this.#name;
    }

    get vendor(): number {
        return this.#vendor;
    }

    get hasSession(): boolean {
        return this.#sessionKey !== undefined;
    }

    /** next value `nextSequence` will hand out */
    get sequence(): number {
        return this.#sequence;
    }

    get meshAddress(): number {
        return this.#meshAddress;
    }

    /** sorted */
    get groups(): number[] {
        return Array.from(this.#groups).sort((a, b) => a - b);
    }

    // #endregion

    /**
     * Replace the identity. Any current session is dropped, even if values are unchanged.
     * Validated as a whole: on throw, nothing is modified.
     */
    public setIdentity(params: MeshParameters): void {
        const [reversedAddress, vendor] = validateMeshParameters(params);

        this.clear();

        this.#address = params.address.toUpperCase();
        this.#reversedAddress = reversedAddress;
        this.#name = params.name;
        this.#password = params.password;
        this.#vendor = vendor;
        this.#meshAddress = params.meshAddress ?? 0;
        this.#groups.clear();
    }

    /**
     * Partial version of `setIdentity`.
     */
    public updateIdentity(params: Partial<MeshParameters>): void {
        this.setIdentity({
            address: params.address ?? this.#address,
            name: params.name ?? this.#name,
            password: params.password ?? this.#password,
            vendor: params.vendor ?? this.#vendor,
            meshAddress: params.meshAddress ?? this.#meshAddress,
        });
    }

    /**
     * Pairing request proving knowledge of the credentials, see `makePairingRequest`.
     */
    public makePairingRequest(nonceLocal: Buffer): Buffer {
        return makePairingRequest(this.#name, this.#password, nonceLocal);
    }

    /**
     * Derive the session key from the pairing nonces. Starts a new session: sequence restarts at 1.
     */
    public establish(nonceLocal: Buffer, nonceRemote: Buffer): void {
        const sessionKey = deriveSessionKey(this.#name, this.#password, nonceLocal, nonceRemote);

        this.clear();

        this.#sessionKey = sessionKey;
        this.#sequence = 1;

        logger.debug(() => `Session established with ${this.#address}`, NS);
    }

    /**
     * Zero-fill and drop the session key.
     */
    public clear(): void {
        if (this.#sessionKey !== undefined) {
            this.#sessionKey.fill(0);
            this.#sessionKey = undefined;

            logger.debug(() => `Session cleared for ${this.#address}`, NS);
        }
    }

    /**
     * @throws TelinkMeshError NoActiveSession
     */
    public requireSession(): void {
        this.sessionKeyOrThrow();
    }

    /**
     * Fill the check field and encrypt a cleartext command frame for this device.
     */
    public encryptCommand(cleartext: Buffer): Buffer {
        return encryptCommandFrame(this.sessionKeyOrThrow(), this.#reversedAddress, cleartext);
    }

    /**
     * Decrypt a notification frame from this device.
     */
    public decryptNotification(ciphertext: Buffer): Buffer {
        return decryptNotificationFrame(this.sessionKeyOrThrow(), this.#reversedAddress, ciphertext);
    }

    private sessionKeyOrThrow(): Buffer {
        if (this.#sessionKey === undefined) {
            throw new TelinkMeshError(TelinkMeshErrorCode.NO_ACTIVE_SESSION, `No session established with ${this.#address}`);
        }

        return this.#sessionKey;
    }

    /**
     * @returns current sequence, then increases it by 1 (mod 2^16)
     */
    public nextSequence(): number {
        const sequence = this.#sequence;

        this.#sequence = (sequence + 1) & SEQUENCE_MASK;

        return sequence;
    }

    /**
     * Resume a counter, e.g. when reconnecting to a device without new pairing.
     */
    public setSequence(sequence: number): void {
        if (!Number.isInteger(sequence) || sequence < 0 || sequence > SEQUENCE_MASK) {
            throw new RangeError(`Invalid sequence ${sequence}`);
        }

        this.#sequence = sequence;
    }

    public setMeshAddress(meshAddress: number): void {
        if (!isMeshAddressField(meshAddress)) {
            throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_MESH_ADDRESS, `Invalid mesh address ${meshAddress}`);
        }

        this.#meshAddress = meshAddress;
    }

    public setGroups(groups: Iterable<number>): void {
        this.#groups.clear();

        for (const group of groups) {
            this.#groups.add(group);
        }
    }
}
