import { TelinkConsts, TelinkMeshError, TelinkMeshErrorCode, telinkEncrypt } from "./telink.js";

export const enum TelinkFrameConsts {
    FRAME_SIZE = 20,
    PAYLOAD_SIZE = 10,

    //---- offsets (both directions)
    SEQUENCE_OFFSET = 0,
    SEQUENCE_SIZE = 3,
    COMMAND_OFFSET = 7,
    VENDOR_OFFSET = 8,
    PAYLOAD_OFFSET = 10,

    //---- offsets (command frames, outbound)
    CHECK_OFFSET = 3,
    DESTINATION_OFFSET = 5,
    /** bytes covered by check & encryption */
    COMMAND_ENCRYPTED_OFFSET = 5,
    COMMAND_ENCRYPTED_SIZE = 15,
    /** address bytes bound into command nonces */
    COMMAND_NONCE_ADDRESS_SIZE = 4,
    COMMAND_NONCE_MARKER = 0x01,
    COMMAND_CHECK_LENGTH_MARKER = 0x0f,

    //---- offsets (notification frames, inbound)
    SOURCE_OFFSET = 3,
    NOTIFICATION_CHECK_OFFSET = 5,
    NOTIFICATION_ENCRYPTED_OFFSET = 7,
    NOTIFICATION_ENCRYPTED_SIZE = 13,
    NOTIFICATION_NONCE_ADDRESS_SIZE = 3,
    /** sequence + source + check */
    NOTIFICATION_NONCE_FRAME_SIZE = 5,
}

/**
 * Cleartext layout of a frame sent by the client (command endpoint).
 *
 * ```
 * | sequence (3) | check (2) | destination (2) | command (1) | vendor (2) | payload (10) |
 * ```
 */
export type TelinkCommandFrame = {
    /** uint24_t, only the low 16 bits are used by this client */
    sequence: number;
    /** uint16_t, filled by encryption */
    check: number;
    /** uint16_t, mesh address of the target (device or group) */
    destination: number;
    /** uint8_t */
    command: number;
    /** uint16_t */
    vendor: number;
    payload: Buffer;
};

/**
 * Cleartext layout of a frame received from the device (notify endpoint).
 *
 * ```
 * | sequence (3) | source (2) | check (2) | command (1) | vendor (2) | payload (10) |
 * ```
 */
export type TelinkNotificationFrame = {
    /** uint24_t */
    sequence: number;
    /** uint16_t, mesh address of the reporting device */
    source: number;
    /** uint16_t */
    check: number;
    /** uint8_t */
    command: number;
    /** uint16_t */
    vendor: number;
    payload: Buffer;
};

function assertCodecInputs(key: Buffer, reversedAddress: Buffer, frame: Buffer): void {
    if (frame.byteLength !== TelinkFrameConsts.FRAME_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid frame length ${frame.byteLength}`);
    }

    if (key.byteLength !== TelinkConsts.KEY_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid key length ${key.byteLength}`);
    }

    if (reversedAddress.byteLength !== TelinkConsts.MAC_ADDRESS_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid address length ${reversedAddress.byteLength}`);
    }
}

function writePayload(frame: Buffer, payload: Buffer): void {
    if (payload.byteLength > TelinkFrameConsts.PAYLOAD_SIZE) {
        throw new TelinkMeshError(
            TelinkMeshErrorCode.PAYLOAD_TOO_LARGE,
            `Payload is ${payload.byteLength} bytes long, max is ${TelinkFrameConsts.PAYLOAD_SIZE}`,
        );
    }

    // rest stays zero-filled
    frame.set(payload, TelinkFrameConsts.PAYLOAD_OFFSET);
}

export function encodeCommandFrame(frame: TelinkCommandFrame): Buffer {
    const data = Buffer.alloc(TelinkFrameConsts.FRAME_SIZE);

    data.writeUIntLE(frame.sequence, TelinkFrameConsts.SEQUENCE_OFFSET, TelinkFrameConsts.SEQUENCE_SIZE);
    data.writeUInt16LE(frame.check, TelinkFrameConsts.CHECK_OFFSET);
    data.writeUInt16LE(frame.destination, TelinkFrameConsts.DESTINATION_OFFSET);
    data.writeUInt8(frame.command, TelinkFrameConsts.COMMAND_OFFSET);
    data.writeUInt16LE(frame.vendor, TelinkFrameConsts.VENDOR_OFFSET);
    writePayload(data, frame.payload);

    return data;
}

export function decodeCommandFrame(data: Buffer): TelinkCommandFrame {
    if (data.byteLength !== TelinkFrameConsts.FRAME_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid frame length ${data.byteLength}`);
    }

    return {
        sequence: data.readUIntLE(TelinkFrameConsts.SEQUENCE_OFFSET, TelinkFrameConsts.SEQUENCE_SIZE),
        check: data.readUInt16LE(TelinkFrameConsts.CHECK_OFFSET),
        destination: data.readUInt16LE(TelinkFrameConsts.DESTINATION_OFFSET),
        command: data.readUInt8(TelinkFrameConsts.COMMAND_OFFSET),
        vendor: data.readUInt16LE(TelinkFrameConsts.VENDOR_OFFSET),
        payload: Buffer.from(data.subarray(TelinkFrameConsts.PAYLOAD_OFFSET)),
    };
}

export function encodeNotificationFrame(frame: TelinkNotificationFrame): Buffer {
    const data = Buffer.alloc(TelinkFrameConsts.FRAME_SIZE);

    data.writeUIntLE(frame.sequence, TelinkFrameConsts.SEQUENCE_OFFSET, TelinkFrameConsts.SEQUENCE_SIZE);
    data.writeUInt16LE(frame.source, TelinkFrameConsts.SOURCE_OFFSET);
    data.writeUInt16LE(frame.check, TelinkFrameConsts.NOTIFICATION_CHECK_OFFSET);
    data.writeUInt8(frame.command, TelinkFrameConsts.COMMAND_OFFSET);
    data.writeUInt16LE(frame.vendor, TelinkFrameConsts.VENDOR_OFFSET);
    writePayload(data, frame.payload);

    return data;
}

export function decodeNotificationFrame(data: Buffer): TelinkNotificationFrame {
    if (data.byteLength !== TelinkFrameConsts.FRAME_SIZE) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_FRAME_LENGTH, `Invalid frame length ${data.byteLength}`);
    }

    return {
        sequence: data.readUIntLE(TelinkFrameConsts.SEQUENCE_OFFSET, TelinkFrameConsts.SEQUENCE_SIZE),
        source: data.readUInt16LE(TelinkFrameConsts.SOURCE_OFFSET),
        check: data.readUInt16LE(TelinkFrameConsts.NOTIFICATION_CHECK_OFFSET),
        command: data.readUInt8(TelinkFrameConsts.COMMAND_OFFSET),
        vendor: data.readUInt16LE(TelinkFrameConsts.VENDOR_OFFSET),
        payload: Buffer.from(data.subarray(TelinkFrameConsts.PAYLOAD_OFFSET)),
    };
}

/**
 * `prefix | addr[0..4] | 0x01 | sequence[3]`, zero-padded to a block
 */
function makeCommandNonce(prefix: number[], reversedAddress: Buffer, frame: Buffer, suffix: number[]): Buffer {
    return Buffer.from([
        ...prefix,
        ...reversedAddress.subarray(0, TelinkFrameConsts.COMMAND_NONCE_ADDRESS_SIZE),
        TelinkFrameConsts.COMMAND_NONCE_MARKER,
        ...frame.subarray(TelinkFrameConsts.SEQUENCE_OFFSET, TelinkFrameConsts.SEQUENCE_SIZE),
        ...suffix,
    ]);
}

/**
 * CBC-MAC over the 15 trailing bytes of a cleartext command frame, truncated to 2 bytes.
 */
export function computeCommandCheck(key: Buffer, reversedAddress: Buffer, cleartext: Buffer): Buffer {
    assertCodecInputs(key, reversedAddress, cleartext);

    const authenticator = telinkEncrypt(key, makeCommandNonce([], reversedAddress, cleartext, [TelinkFrameConsts.COMMAND_CHECK_LENGTH_MARKER]));

    for (let i = 0; i < TelinkFrameConsts.COMMAND_ENCRYPTED_SIZE; i++) {
        authenticator[i] ^= cleartext[TelinkFrameConsts.COMMAND_ENCRYPTED_OFFSET + i];
    }

    return telinkEncrypt(key, authenticator).subarray(0, 2);
}

function xorCommandKeystream(key: Buffer, reversedAddress: Buffer, frame: Buffer): void {
    const keystream = telinkEncrypt(key, makeCommandNonce([0x00], reversedAddress, frame, []));

    for (let i = 0; i < TelinkFrameConsts.COMMAND_ENCRYPTED_SIZE; i++) {
        frame[TelinkFrameConsts.COMMAND_ENCRYPTED_OFFSET + i] ^= keystream[i];
    }
}

/**
 * Fills the check field and encrypts destination, command, vendor and payload.
 * Sequence and check remain in clear.
 */
export function encryptCommandFrame(key: Buffer, reversedAddress: Buffer, cleartext: Buffer): Buffer {
    const check = computeCommandCheck(key, reversedAddress, cleartext);
    const frame = Buffer.from(cleartext);

    frame.set(check, TelinkFrameConsts.CHECK_OFFSET);
    xorCommandKeystream(key, reversedAddress, frame);

    return frame;
}

/**
 * Inverse of `encryptCommandFrame`. Check is returned as received, see `verifyCommandFrame`.
 */
export function decryptCommandFrame(key: Buffer, reversedAddress: Buffer, ciphertext: Buffer): Buffer {
    assertCodecInputs(key, reversedAddress, ciphertext);

    const frame = Buffer.from(ciphertext);

    xorCommandKeystream(key, reversedAddress, frame);

    return frame;
}

/**
 * @param cleartext as returned by `decryptCommandFrame`
 */
export function verifyCommandFrame(key: Buffer, reversedAddress: Buffer, cleartext: Buffer): boolean {
    return computeCommandCheck(key, reversedAddress, cleartext).equals(
        cleartext.subarray(TelinkFrameConsts.CHECK_OFFSET, TelinkFrameConsts.CHECK_OFFSET + 2),
    );
}

/**
 * Notifications carry no usable integrity check: this never fails on malformed input,
 * anything decrypts to *something*.
 */
export function decryptNotificationFrame(key: Buffer, reversedAddress: Buffer, ciphertext: Buffer): Buffer {
    assertCodecInputs(key, reversedAddress, ciphertext);

    const frame = Buffer.from(ciphertext);
    const nonce = Buffer.from([
        0x00,
        ...reversedAddress.subarray(0, TelinkFrameConsts.NOTIFICATION_NONCE_ADDRESS_SIZE),
        ...frame.subarray(0, TelinkFrameConsts.NOTIFICATION_NONCE_FRAME_SIZE),
    ]);
    const keystream = telinkEncrypt(key, nonce);

    for (let i = 0; i < TelinkFrameConsts.NOTIFICATION_ENCRYPTED_SIZE; i++) {
        frame[TelinkFrameConsts.NOTIFICATION_ENCRYPTED_OFFSET + i] ^= keystream[i];
    }

    return frame;
}

/** Keystream XOR, same transform both ways */
export const encryptNotificationFrame = decryptNotificationFrame;
