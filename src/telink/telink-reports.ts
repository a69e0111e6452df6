import { formatMACAddress, TelinkCommand, TelinkConsts } from "./telink.js";

export const enum TelinkReportConsts {
    /** unused group slot in a group id report */
    GROUP_SLOT_EMPTY = 0xff,
    DEVICE_INFO_TYPE_VERSION = 0x02,
    ONLINE_STATUS_ENTRY_SIZE = 4,
    ONLINE_STATUS_MAX_ENTRIES = 2,
}

type BaseReport = {
    /** mesh address of the reporting device */
    source: number;
    /** uint24_t from the frame header */
    sequence: number;
};

export type TimeReport = BaseReport & {
    type: "time";
    year: number;
    /** 1-12 */
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    /** 0 = Sunday */
    weekday: number;
};

export type AddressReport = BaseReport & {
    type: "address";
    meshAddress: number;
    /** AA:BB:CC:DD:EE:FF, when the device includes it */
    macAddress?: string;
};

export type DeviceInfoReport = BaseReport & {
    type: "deviceInfo";
    /** 0x02 for firmware version, other values carry raw identifiers */
    infoType: number;
    version?: string;
    data: Buffer;
};

export type GroupIdReport = BaseReport & {
    type: "groupId";
    /** 0x8000-0x80ff */
    groups: number[];
};

export type OnlineStatusEntry = {
    meshAddress: number;
    online: boolean;
    /** raw status byte, 0 when offline */
    status: number;
    brightness: number;
    flags: number;
};

export type OnlineStatusReport = BaseReport & {
    type: "onlineStatus";
    devices: OnlineStatusEntry[];
};

export type OtaStatusReport = BaseReport & {
    type: "otaStatus";
    state: number;
};

export type UnrecognizedReport = BaseReport & {
    type: "unrecognized";
    reason: "unknown-command" | "vendor-mismatch";
    command: number;
    payload: Buffer;
};

export type TelinkReport = TimeReport | AddressReport | DeviceInfoReport | GroupIdReport | OnlineStatusReport | OtaStatusReport | UnrecognizedReport;

export type RecognizedReport = Exclude<TelinkReport, UnrecognizedReport>;

export function decodeTimeReport(payload: Buffer, source: number, sequence: number): TimeReport {
    const year = payload.readUInt16LE(0);
    const month = payload.readUInt8(2);
    const day = payload.readUInt8(3);
    const utcDate = new Date(0);

    // Date.UTC maps years 0-99 to 1900-1999
    utcDate.setUTCFullYear(year, month - 1, day);

    return {
        type: "time",
        source,
        sequence,
        year,
        month,
        day,
        hour: payload.readUInt8(4),
        minute: payload.readUInt8(5),
        second: payload.readUInt8(6),
        weekday: utcDate.getUTCDay(),
    };
}

export function decodeAddressReport(payload: Buffer, source: number, sequence: number): AddressReport {
    const mac = payload.subarray(2, 2 + TelinkConsts.MAC_ADDRESS_SIZE);

    return {
        type: "address",
        source,
        sequence,
        meshAddress: payload.readUInt16LE(0),
        // sent little-endian
        macAddress: mac.some((b) => b !== 0) ? formatMACAddress(Buffer.from(mac).reverse()) : undefined,
    };
}

export function decodeDeviceInfoReport(payload: Buffer, source: number, sequence: number): DeviceInfoReport {
    const infoType = payload.readUInt8(0);
    const data = Buffer.from(payload.subarray(1));
    let version: string | undefined;

    if (infoType === TelinkReportConsts.DEVICE_INFO_TYPE_VERSION) {
        const end = data.indexOf(0);

        version = data.toString("latin1", 0, end === -1 ? data.byteLength : end);
    }

    return { type: "deviceInfo", source, sequence, infoType, version, data };
}

export function decodeGroupIdReport(payload: Buffer, source: number, sequence: number): GroupIdReport {
    const groups: number[] = [];

    for (const slot of payload) {
        if (slot !== TelinkReportConsts.GROUP_SLOT_EMPTY) {
            groups.push(TelinkConsts.GROUP_ADDRESS_MIN | slot);
        }
    }

    return { type: "groupId", source, sequence, groups };
}

export function decodeOnlineStatusReport(payload: Buffer, source: number, sequence: number): OnlineStatusReport {
    const devices: OnlineStatusEntry[] = [];

    for (let i = 0; i < TelinkReportConsts.ONLINE_STATUS_MAX_ENTRIES; i++) {
        const offset = i * TelinkReportConsts.ONLINE_STATUS_ENTRY_SIZE;
        const meshAddress = payload.readUInt8(offset);

        if (meshAddress === 0) {
            break;
        }

        const status = payload.readUInt8(offset + 1);

        devices.push({
            meshAddress,
            online: status !== 0,
            status,
            brightness: payload.readUInt8(offset + 2),
            flags: payload.readUInt8(offset + 3),
        });
    }

    return { type: "onlineStatus", source, sequence, devices };
}

export function decodeOtaStatusReport(payload: Buffer, source: number, sequence: number): OtaStatusReport {
    return { type: "otaStatus", source, sequence, state: payload.readUInt8(0) };
}

type ReportDecoder = (payload: Buffer, source: number, sequence: number) => RecognizedReport;

/** Command codes of device-to-client reports, and their payload decoder */
export const REPORT_DECODERS: ReadonlyMap<number, ReportDecoder> = new Map<number, ReportDecoder>([
    [TelinkCommand.TIME_REPORT, decodeTimeReport],
    [TelinkCommand.ADDRESS_REPORT, decodeAddressReport],
    [TelinkCommand.DEVICE_INFO_REPORT, decodeDeviceInfoReport],
    [TelinkCommand.GROUP_ID_REPORT, decodeGroupIdReport],
    [TelinkCommand.ONLINE_STATUS_REPORT, decodeOnlineStatusReport],
    [TelinkCommand.OTA_STATUS_REPORT, decodeOtaStatusReport],
]);
