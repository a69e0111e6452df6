import { createCipheriv } from "node:crypto";

/**
 * const enum with sole purpose of avoiding "magic numbers" in code for well-known values
 */
export const enum TelinkConsts {
    BLOCK_SIZE = 16,
    KEY_SIZE = 16,
    NONCE_SIZE = 8,
    /** Max byte length of mesh name and of mesh password */
    CREDENTIAL_MAX_SIZE = 16,
    MAC_ADDRESS_SIZE = 6,

    /** Telink Semiconductor */
    DEFAULT_VENDOR = 0x0211,

    //---- Pairing (written to / read from the pair endpoint)
    PAIR_REQUEST = 0x0c,
    PAIR_ACCEPTED = 0x0d,
    PAIR_REJECTED = 0x0e,
    /** opcode + nonce + 8 bytes of proof */
    PAIR_REQUEST_SIZE = 17,
    /** opcode + nonce */
    PAIR_RESPONSE_MIN_SIZE = 9,

    //---- Addressing
    DEVICE_ADDRESS_MIN = 1,
    DEVICE_ADDRESS_MAX = 254,
    GROUP_ADDRESS_MIN = 0x8000,
    GROUP_ADDRESS_MAX = 0x80ff,
}

/** Command codes, single byte */
export const enum TelinkCommand {
    OTA_UPDATE = 0xc6,
    QUERY_OTA_STATE = 0xc7,
    OTA_STATUS_REPORT = 0xc8,
    GROUP_ID_QUERY = 0xdd,
    GROUP_ID_REPORT = 0xd4,
    GROUP_EDIT = 0xd7,
    ONLINE_STATUS_REPORT = 0xdc,
    ADDRESS_EDIT = 0xe0,
    ADDRESS_REPORT = 0xe1,
    RESET = 0xe3,
    TIME_QUERY = 0xe8,
    TIME_REPORT = 0xe9,
    TIME_SET = 0xe4,
    DEVICE_INFO_QUERY = 0xea,
    DEVICE_INFO_REPORT = 0xeb,
}

export enum TelinkMeshErrorCode {
    INVALID_CREDENTIALS = "InvalidCredentials",
    PAIRING_NONCE = "PairingNonceError",
    INVALID_FRAME_LENGTH = "InvalidFrameLength",
    PAYLOAD_TOO_LARGE = "PayloadTooLarge",
    NO_ACTIVE_SESSION = "NoActiveSession",
    INVALID_MESH_ADDRESS = "InvalidMeshAddress",
    INVALID_COMMAND = "InvalidCommand",
    INVALID_ADDRESS = "InvalidAddress",
    PAIRING_REJECTED = "PairingRejected",
    PAIRING_FAILED = "PairingFailed",
}

/**
 * Local precondition violations of the protocol engine.
 * Transport failures are never wrapped into this.
 */
export class TelinkMeshError extends Error {
    public readonly code: TelinkMeshErrorCode;

    constructor(code: TelinkMeshErrorCode, message: string) {
        super(`${code}: ${message}`);

        this.name = "TelinkMeshError";
        this.code = code;
    }
}

const MAC_ADDRESS_REGEX = /^[0-9a-f]{2}(?::[0-9a-f]{2}){5}$/i;

/**
 * @param address in the form AA:BB:CC:DD:EE:FF
 * @returns the 6 address bytes, in display order
 */
export function parseMACAddress(address: string): Buffer {
    if (!MAC_ADDRESS_REGEX.test(address)) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_ADDRESS, `Invalid MAC address "${address}"`);
    }

    return Buffer.from(address.replaceAll(":", ""), "hex");
}

export function formatMACAddress(address: Buffer): string {
    return Array.from(address, (b) => b.toString(16).padStart(2, "0").toUpperCase()).join(":");
}

/**
 * Little-endian form of the MAC address as used on the wire (bound into frame nonces).
 */
export function reverseMACAddress(address: string): Buffer {
    return parseMACAddress(address).reverse();
}

export function isDeviceAddress(address: number): boolean {
    return Number.isInteger(address) && address >= TelinkConsts.DEVICE_ADDRESS_MIN && address <= TelinkConsts.DEVICE_ADDRESS_MAX;
}

export function isGroupAddress(address: number): boolean {
    return Number.isInteger(address) && address >= TelinkConsts.GROUP_ADDRESS_MIN && address <= TelinkConsts.GROUP_ADDRESS_MAX;
}

/**
 * AES-128-ECB as used by the Telink stack: key, input and output are all byte-reversed.
 * `data` shorter than a block is zero-padded.
 */
export function telinkEncrypt(key: Buffer, data: Buffer): Buffer {
    if (key.byteLength !== TelinkConsts.KEY_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid key length ${key.byteLength}`);
    }

    if (data.byteLength > TelinkConsts.BLOCK_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid block length ${data.byteLength}`);
    }

    const block = Buffer.alloc(TelinkConsts.BLOCK_SIZE);

    block.set(data, 0);

    const cipher = createCipheriv("aes-128-ecb", Buffer.from(key).reverse(), null);

    cipher.setAutoPadding(false);

    const u = cipher.update(block.reverse());
    const f = cipher.final();
    const encryptedBlock = Buffer.alloc(u.byteLength + f.byteLength);

    encryptedBlock.set(u, 0);
    encryptedBlock.set(f, u.byteLength);

    return encryptedBlock.reverse();
}

function encodeCredential(value: string, label: string): Buffer {
    const encoded = Buffer.from(value, "utf8");

    if (encoded.byteLength > TelinkConsts.CREDENTIAL_MAX_SIZE) {
        throw new TelinkMeshError(
            TelinkMeshErrorCode.INVALID_CREDENTIALS,
            `Mesh ${label} is ${encoded.byteLength} bytes long, max is ${TelinkConsts.CREDENTIAL_MAX_SIZE}`,
        );
    }

    return encoded;
}

/**
 * Name and password, each zero-padded to 16 bytes, XORed together.
 * Used as key for session key derivation, and as plaintext for the pairing proof.
 */
export function combineNameAndPassword(name: string, password: string): Buffer {
    const encodedName = encodeCredential(name, "name");
    const encodedPassword = encodeCredential(password, "password");
    const combined = Buffer.alloc(TelinkConsts.CREDENTIAL_MAX_SIZE);

    for (let i = 0; i < TelinkConsts.CREDENTIAL_MAX_SIZE; i++) {
        combined[i] = (encodedName[i] ?? 0) ^ (encodedPassword[i] ?? 0);
    }

    return combined;
}

function assertNonce(nonce: Buffer, label: string): void {
    if (nonce.byteLength !== TelinkConsts.NONCE_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.PAIRING_NONCE, `${label} nonce must be ${TelinkConsts.NONCE_SIZE} bytes, got ${nonce.byteLength}`);
    }
}

/**
 * Session key = E(name ^ password, nonceLocal || nonceRemote)
 */
export function deriveSessionKey(name: string, password: string, nonceLocal: Buffer, nonceRemote: Buffer): Buffer {
    assertNonce(nonceLocal, "Local");
    assertNonce(nonceRemote, "Remote");

    const key = combineNameAndPassword(name, password);

    return telinkEncrypt(key, Buffer.concat([nonceLocal, nonceRemote]));
}

/**
 * Proves knowledge of the credentials to the device: E(nonceLocal, name ^ password)
 */
export function encryptPairingProof(name: string, password: string, nonceLocal: Buffer): Buffer {
    assertNonce(nonceLocal, "Local");

    const key = Buffer.alloc(TelinkConsts.KEY_SIZE);

    key.set(nonceLocal, 0);

    return telinkEncrypt(key, combineNameAndPassword(name, password));
}

/**
 * 0x0c | nonceLocal[8] | proof[0..8]
 */
export function makePairingRequest(name: string, password: string, nonceLocal: Buffer): Buffer {
    const proof = encryptPairingProof(name, password, nonceLocal);
    const request = Buffer.alloc(TelinkConsts.PAIR_REQUEST_SIZE);
    let offset = request.writeUInt8(TelinkConsts.PAIR_REQUEST, 0);

    request.set(nonceLocal, offset);
    offset += TelinkConsts.NONCE_SIZE;

    request.set(proof.subarray(0, TelinkConsts.NONCE_SIZE), offset);

    return request;
}

/**
 * @returns the device's nonce
 */
export function decodePairingResponse(data: Buffer): Buffer {
    const opcode = data.byteLength > 0 ? data.readUInt8(0) : undefined;

    if (opcode === TelinkConsts.PAIR_REJECTED) {
        throw new TelinkMeshError(TelinkMeshErrorCode.PAIRING_REJECTED, "Device rejected mesh name/password");
    }

    if (opcode !== TelinkConsts.PAIR_ACCEPTED || data.byteLength < TelinkConsts.PAIR_RESPONSE_MIN_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.PAIRING_FAILED, `Unexpected pairing response [${data.toString("hex")}]`);
    }

    return Buffer.from(data.subarray(1, TelinkConsts.PAIR_RESPONSE_MIN_SIZE));
}
