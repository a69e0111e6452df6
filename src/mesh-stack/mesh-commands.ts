import { isDeviceAddress, isGroupAddress, TelinkCommand, TelinkMeshError, TelinkMeshErrorCode } from "../telink/telink.js";
import { TelinkReportConsts } from "../telink/telink-reports.js";
import { buildPacket } from "./packet-builder.js";
import type { SessionState } from "./session-state.js";

export const enum MeshCommandConsts {
    /** generic "query" parameter */
    QUERY = 0x10,
    DEVICE_INFO_GENERAL = 0x00,
    DEVICE_INFO_VERSION = 0x02,
    GROUP_QUERY_PARAM_0 = 0x0a,
    GROUP_QUERY_PARAM_1 = 0x01,
    GROUP_DELETE = 0x00,
    GROUP_ADD = 0x01,
    GROUP_ADDRESS_HIGH = 0x80,
    /** address edit with this value queries instead of setting */
    ADDRESS_QUERY = 0xffff,
}

/**
 * High-level operations. Each returns the ciphertext frame to write to the command endpoint.
 *
 * There is no acknowledgement: the matching report (if any) arrives later through the dispatcher
 * and must be correlated by report type/content.
 */
export class MeshCommands {
    readonly #state: SessionState;

    constructor(state: SessionState) {
        this.#state = state;
    }

    public queryTime(): Buffer {
        return buildPacket(this.#state, TelinkCommand.TIME_QUERY, Buffer.from([MeshCommandConsts.QUERY]));
    }

    /**
     * @param date local date & time to set, defaults to now
     */
    public setTime(date = new Date()): Buffer {
        const payload = Buffer.alloc(7);
        let offset = payload.writeUInt16LE(date.getFullYear(), 0);
        offset = payload.writeUInt8(date.getMonth() + 1, offset);
        offset = payload.writeUInt8(date.getDate(), offset);
        offset = payload.writeUInt8(date.getHours(), offset);
        offset = payload.writeUInt8(date.getMinutes(), offset);
        payload.writeUInt8(date.getSeconds(), offset);

        return buildPacket(this.#state, TelinkCommand.TIME_SET, payload);
    }

    public queryDeviceInfo(): Buffer {
        return buildPacket(this.#state, TelinkCommand.DEVICE_INFO_QUERY, Buffer.from([MeshCommandConsts.QUERY, MeshCommandConsts.DEVICE_INFO_GENERAL]));
    }

    public queryDeviceVersion(): Buffer {
        return buildPacket(this.#state, TelinkCommand.DEVICE_INFO_QUERY, Buffer.from([MeshCommandConsts.QUERY, MeshCommandConsts.DEVICE_INFO_VERSION]));
    }

    public queryGroups(): Buffer {
        return buildPacket(
            this.#state,
            TelinkCommand.GROUP_ID_QUERY,
            Buffer.from([MeshCommandConsts.GROUP_QUERY_PARAM_0, MeshCommandConsts.GROUP_QUERY_PARAM_1]),
        );
    }

    public queryMeshId(): Buffer {
        const payload = Buffer.alloc(2);

        payload.writeUInt16LE(MeshCommandConsts.ADDRESS_QUERY, 0);

        return buildPacket(this.#state, TelinkCommand.ADDRESS_EDIT, payload);
    }

    /**
     * The session's mesh address is only updated once the device reports it.
     * @param meshAddress 1-254 for a device, 0x8000-0x80ff for a group
     */
    public setMeshId(meshAddress: number): Buffer {
        if (!isDeviceAddress(meshAddress) && !isGroupAddress(meshAddress)) {
            throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_MESH_ADDRESS, `Invalid mesh address ${meshAddress}`);
        }

        const payload = Buffer.alloc(2);

        payload.writeUInt16LE(meshAddress, 0);

        return buildPacket(this.#state, TelinkCommand.ADDRESS_EDIT, payload);
    }

    /**
     * @param group 0x8000-0x80fe, or its low byte
     */
    public addGroup(group: number): Buffer {
        return this.editGroup(MeshCommandConsts.GROUP_ADD, group);
    }

    /**
     * @param group 0x8000-0x80fe, or its low byte
     */
    public deleteGroup(group: number): Buffer {
        return this.editGroup(MeshCommandConsts.GROUP_DELETE, group);
    }

    public reset(): Buffer {
        return buildPacket(this.#state, TelinkCommand.RESET, Buffer.from([0x00]));
    }

    public queryOtaState(): Buffer {
        return buildPacket(this.#state, TelinkCommand.QUERY_OTA_STATE);
    }

    private editGroup(action: MeshCommandConsts.GROUP_ADD | MeshCommandConsts.GROUP_DELETE, group: number): Buffer {
        const isLowByte = Number.isInteger(group) && group >= 0 && group <= 0xff;

        // 0xff marks an empty slot in group id reports, such a group could never be reported back
        if ((!isLowByte && !isGroupAddress(group)) || (group & 0xff) === TelinkReportConsts.GROUP_SLOT_EMPTY) {
            throw new TelinkMeshError(TelinkMeshErrorCode.INVALID_MESH_ADDRESS, `Invalid group address ${group}`);
        }

        return buildPacket(this.#state, TelinkCommand.GROUP_EDIT, Buffer.from([action, group & 0xff, MeshCommandConsts.GROUP_ADDRESS_HIGH]));
    }
}
