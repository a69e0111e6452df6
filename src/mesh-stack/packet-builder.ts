import { TelinkMeshError, TelinkMeshErrorCode } from "../telink/telink.js";
import { encodeCommandFrame, TelinkFrameConsts } from "../telink/telink-frame.js";
import { logger } from "../utils/logger.js";
import { isMeshAddressField, type SessionState } from "./session-state.js";

const NS = "packet-builder";

/**
 * Lay out and encrypt a command frame for the session's device.
 *
 * Consumes exactly one sequence number per successful call. Nothing is consumed when this throws.
 *
 * @param command command code (see `TelinkCommand`), uint8_t
 * @param payload up to 10 bytes, zero-padded
 * @param destination mesh address of the target, defaults to the session's device
 * @returns 20-byte ciphertext, ready for the command endpoint
 */
export function buildPacket(state: SessionState, command: number, payload: Buffer = Buffer.alloc(0), destination = state.meshAddress): Buffer {
    if (payload.byteLength > TelinkFrameConsts.PAYLOAD_SIZE) {
        throw new TelinkMeshError(
            TelinkMeshErrorCode.PAYLOAD_TOO_LARGE,
            `Payload is ${payload.byteLength} bytes long, max is ${TelinkFrameConsts.PAYLOAD_SIZE}`,
        );
    }

    if (!Number.isInteger(command) || command < 0 || command > 0xff) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_COMMAND, `Invalid command code ${command}`);
    }

    if (!isMeshAddressField(destination)) {
        throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_MESH_ADDRESS, `Invalid destination ${destination}`);
    }

    state.requireSession();

    const sequence = state.nextSequence();
    const cleartext = encodeCommandFrame({
        sequence,
        check: 0,
        destination,
        command,
        vendor: state.vendor,
        payload,
    });

    logger.debug(() => `~~~> CMD[seq=${sequence} cmd=${command} dst=${destination} payload=${payload.toString("hex")}]`, NS);

    return state.encryptCommand(cleartext);
}
