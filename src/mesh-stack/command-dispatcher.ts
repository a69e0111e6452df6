import { decodeNotificationFrame } from "../telink/telink-frame.js";
import {
    type AddressReport,
    type DeviceInfoReport,
    type GroupIdReport,
    type OnlineStatusReport,
    type OtaStatusReport,
    REPORT_DECODERS,
    type TelinkReport,
    type TimeReport,
    type UnrecognizedReport,
} from "../telink/telink-reports.js";
import { logger } from "../utils/logger.js";
import type { SessionState } from "./session-state.js";

const NS = "command-dispatcher";

/**
 * Receives decoded reports, one optional hook per variant.
 * Reports for which no hook is defined are only returned by `onInbound`.
 */
export interface ReportSink {
    onTimeReport?(report: TimeReport): void;
    onAddressReport?(report: AddressReport): void;
    onDeviceInfoReport?(report: DeviceInfoReport): void;
    onGroupIdReport?(report: GroupIdReport): void;
    onOnlineStatusReport?(report: OnlineStatusReport): void;
    onOtaStatusReport?(report: OtaStatusReport): void;
    onUnrecognized?(report: UnrecognizedReport): void;
}

/**
 * Inbound path: decrypt, validate, decode, feed back into session state, notify sink.
 */
export class CommandDispatcher {
    readonly #state: SessionState;
    readonly #sink: ReportSink;

    constructor(state: SessionState, sink: ReportSink = {}) {
        this.#state = state;
        this.#sink = sink;
    }

    /**
     * A frame is valid when its vendor field matches the session's and its command is a known report.
     * Frames encrypted for another device (or with another key) decrypt to noise and fail the vendor check.
     * Invalid frames yield an `unrecognized` report, never an error.
     *
     * @param data 20-byte ciphertext from the notify endpoint
     */
    public onInbound(data: Buffer): TelinkReport {
        const cleartext = this.#state.decryptNotification(data);
        const frame = decodeNotificationFrame(cleartext);

        logger.debug(() => `<~~~ NOTIFY[seq=${frame.sequence} src=${frame.source} cmd=${frame.command} payload=${frame.payload.toString("hex")}]`, NS);

        let report: TelinkReport;

        if (frame.vendor !== this.#state.vendor) {
            report = {
                type: "unrecognized",
                reason: "vendor-mismatch",
                source: frame.source,
                sequence: frame.sequence,
                command: frame.command,
                payload: frame.payload,
            };
        } else {
            const decoder = REPORT_DECODERS.get(frame.command);

            report = decoder
                ? decoder(frame.payload, frame.source, frame.sequence)
                : {
                      type: "unrecognized",
                      reason: "unknown-command",
                      source: frame.source,
                      sequence: frame.sequence,
                      command: frame.command,
                      payload: frame.payload,
                  };
        }

        this.applyToSession(report);
        this.notifySink(report);

        return report;
    }

    /**
     * Session feedback:
     * - address report: updates the device's mesh address, unless it names another device
     * - group id report: replaces the device's group memberships
     */
    private applyToSession(report: TelinkReport): void {
        switch (report.type) {
            case "address": {
                if (report.macAddress === undefined || report.macAddress === this.#state.address) {
                    this.#state.setMeshAddress(report.meshAddress);
                }

                break;
            }
            case "groupId": {
                this.#state.setGroups(report.groups);
                break;
            }
            case "unrecognized": {
                logger.debug(() => `<~x~ NOTIFY[cmd=${report.command}] Ignoring frame (${report.reason})`, NS);
                break;
            }
        }
    }

    private notifySink(report: TelinkReport): void {
        switch (report.type) {
            case "time": {
                this.#sink.onTimeReport?.(report);
                break;
            }
            case "address": {
                this.#sink.onAddressReport?.(report);
                break;
            }
            case "deviceInfo": {
                this.#sink.onDeviceInfoReport?.(report);
                break;
            }
            case "groupId": {
                this.#sink.onGroupIdReport?.(report);
                break;
            }
            case "onlineStatus": {
                this.#sink.onOnlineStatusReport?.(report);
                break;
            }
            case "otaStatus": {
                this.#sink.onOtaStatusReport?.(report);
                break;
            }
            case "unrecognized": {
                this.#sink.onUnrecognized?.(report);
                break;
            }
        }
    }
}
