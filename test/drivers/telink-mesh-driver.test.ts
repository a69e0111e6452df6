import { beforeEach, describe, expect, it, vi } from "vitest";
import { TelinkMeshDriver } from "../../src/drivers/telink-mesh-driver.js";
import { TelinkCommand, TelinkConsts, TelinkMeshErrorCode } from "../../src/telink/telink.js";
import { logger } from "../../src/utils/logger.js";
import { createPayload, DEVICE_ADDRESS, DEVICE_NAME, DEVICE_PASSWORD, type MockHandle, MockRadioLink, NONCE_LOCAL, SESSION_KEY } from "../utils.js";

describe("Telink mesh driver", () => {
    let link: MockRadioLink;
    let sink: { onTimeReport: ReturnType<typeof vi.fn>; onAddressReport: ReturnType<typeof vi.fn> };
    let driver: TelinkMeshDriver<MockHandle>;

    const makeDriver = (password = DEVICE_PASSWORD): TelinkMeshDriver<MockHandle> =>
        new TelinkMeshDriver(link, { address: DEVICE_ADDRESS, name: DEVICE_NAME, password }, sink, { makeNonce: () => Buffer.from(NONCE_LOCAL) });

    beforeEach(() => {
        link = new MockRadioLink();
        sink = { onTimeReport: vi.fn(), onAddressReport: vi.fn() };
        driver = makeDriver();
    });

    describe("connect", () => {
        it("pairs and enables notifications", async () => {
            await driver.connect();

            expect(driver.connected).toStrictEqual(true);
            expect(link.connectCount).toStrictEqual(1);
            expect(link.writes.map((w) => w.endpoint)).toStrictEqual(["pair", "notify"]);
            expect(link.writes[0].data).toStrictEqual(driver.state.makePairingRequest(NONCE_LOCAL));
            expect(link.writes[1].data).toStrictEqual(Buffer.from([0x01]));
            expect(link.subscribed).toStrictEqual(true);
        });

        it("derives the same session key as the device", async () => {
            await driver.connect();

            expect(link.sessionKey).toStrictEqual(SESSION_KEY);
            expect(driver.state.encryptCommand(Buffer.from("01000000000000e8110200000000000000000000", "hex"))).toStrictEqual(
                Buffer.from("010000972bcfcbccaab772f0f4a81d77dee265cf", "hex"),
            );
        });

        it("uses random nonces by default", async () => {
            const randomDriver = new TelinkMeshDriver(link, { address: DEVICE_ADDRESS, name: DEVICE_NAME, password: DEVICE_PASSWORD });

            await randomDriver.connect();

            expect(randomDriver.connected).toStrictEqual(true);
            expect(link.writes[0].data.byteLength).toStrictEqual(TelinkConsts.PAIR_REQUEST_SIZE);

            await randomDriver.queryTime();

            expect(link.commands[0].checkValid).toStrictEqual(true);
        });

        it("shares one pairing between concurrent callers", async () => {
            await Promise.all([driver.connect(), driver.connect()]);

            expect(link.connectCount).toStrictEqual(1);
            expect(driver.connected).toStrictEqual(true);
        });

        it("does nothing when already connected", async () => {
            await driver.connect();
            await driver.connect();

            expect(link.connectCount).toStrictEqual(1);
        });

        it("cleans up when the device rejects the credentials", async () => {
            driver = makeDriver("wrong");

            await expect(driver.connect()).rejects.toThrow(TelinkMeshErrorCode.PAIRING_REJECTED);
            expect(driver.connected).toStrictEqual(false);
            expect(driver.state.hasSession).toStrictEqual(false);
            expect(link.disconnectCount).toStrictEqual(1);
            expect(link.subscribed).toStrictEqual(false);
        });

        it("keeps the pairing error when releasing the link also fails", async () => {
            const errorSpy = vi.spyOn(logger, "error");
            driver = makeDriver("wrong");
            link.failDisconnect = true;

            await expect(driver.connect()).rejects.toThrow(TelinkMeshErrorCode.PAIRING_REJECTED);
            expect(link.disconnectCount).toStrictEqual(1);
            expect(driver.connected).toStrictEqual(false);
            expect(errorSpy).toHaveBeenCalledTimes(1);
            expect(errorSpy).toHaveBeenCalledWith("Failed to disconnect from AA:BB:CC:DD:EE:FF: Disconnect failed", "telink-mesh-driver");
        });

        it("cleans up on a malformed pairing reply", async () => {
            link.pairReplyOverride = Buffer.from([0x07]);

            await expect(driver.connect()).rejects.toThrow(TelinkMeshErrorCode.PAIRING_FAILED);
            expect(driver.state.hasSession).toStrictEqual(false);
            expect(link.disconnectCount).toStrictEqual(1);
        });

        it("cleans up when enabling notifications fails", async () => {
            link.failWritesTo = "notify";

            await expect(driver.connect()).rejects.toThrow("Write to notify failed");
            expect(driver.connected).toStrictEqual(false);
            expect(driver.state.hasSession).toStrictEqual(false);
            expect(link.subscribed).toStrictEqual(false);
            expect(link.disconnectCount).toStrictEqual(1);
        });

        it("can connect again after a failure", async () => {
            link.failWritesTo = "pair";

            await expect(driver.connect()).rejects.toThrow("Write to pair failed");

            link.failWritesTo = undefined;

            await driver.connect();

            expect(driver.connected).toStrictEqual(true);
            expect(link.connectCount).toStrictEqual(2);
        });
    });

    describe("commands", () => {
        beforeEach(async () => {
            await driver.connect();
        });

        it("writes encrypted frames the device can verify", async () => {
            await driver.queryTime();
            await driver.addGroup(0x8002);

            expect(link.commands).toStrictEqual([
                {
                    frame: {
                        sequence: 1,
                        check: link.commands[0].frame.check,
                        destination: 0,
                        command: TelinkCommand.TIME_QUERY,
                        vendor: 0x0211,
                        payload: createPayload([0x10]),
                    },
                    checkValid: true,
                },
                {
                    frame: {
                        sequence: 2,
                        check: link.commands[1].frame.check,
                        destination: 0,
                        command: TelinkCommand.GROUP_EDIT,
                        vendor: 0x0211,
                        payload: createPayload([0x01, 0x02, 0x80]),
                    },
                    checkValid: true,
                },
            ]);
        });

        it("writes the reference time query", async () => {
            await driver.queryTime();

            expect(link.writes[2]).toStrictEqual({ endpoint: "command", data: Buffer.from("010000e118cfcbccaab762f0f4a81d77dee265cf", "hex") });
        });

        it("sends raw commands to a destination", async () => {
            await driver.sendCommand(0xd0, Buffer.from([0x01, 0x64]), 0x8001);

            expect(link.commands[0].frame.command).toStrictEqual(0xd0);
            expect(link.commands[0].frame.destination).toStrictEqual(0x8001);
            expect(link.commands[0].frame.payload).toStrictEqual(createPayload([0x01, 0x64]));
        });

        it("sends every high-level operation", async () => {
            await driver.setTime(new Date(2026, 0, 2, 3, 4, 5));
            await driver.queryDeviceInfo();
            await driver.queryDeviceVersion();
            await driver.queryGroups();
            await driver.queryMeshId();
            await driver.setMeshId(3);
            await driver.deleteGroup(0x8002);
            await driver.reset();
            await driver.queryOtaState();

            expect(link.commands.map((c) => c.frame.command)).toStrictEqual([
                TelinkCommand.TIME_SET,
                TelinkCommand.DEVICE_INFO_QUERY,
                TelinkCommand.DEVICE_INFO_QUERY,
                TelinkCommand.GROUP_ID_QUERY,
                TelinkCommand.ADDRESS_EDIT,
                TelinkCommand.ADDRESS_EDIT,
                TelinkCommand.GROUP_EDIT,
                TelinkCommand.RESET,
                TelinkCommand.QUERY_OTA_STATE,
            ]);
            expect(link.commands.every((c) => c.checkValid)).toStrictEqual(true);
            expect(link.commands[0].frame.payload).toStrictEqual(createPayload([0xea, 0x07, 0x01, 0x02, 0x03, 0x04, 0x05]));
        });

        it("consumes the sequence number even when the write fails", async () => {
            link.failWritesTo = "command";

            await expect(driver.queryTime()).rejects.toThrow("Write to command failed");
            expect(driver.state.sequence).toStrictEqual(2);

            link.failWritesTo = undefined;

            await driver.queryTime();

            expect(link.commands[0].frame.sequence).toStrictEqual(2);
        });

        it("rejects invalid arguments before writing", async () => {
            await expect(driver.setMeshId(0)).rejects.toThrow(TelinkMeshErrorCode.INVALID_MESH_ADDRESS);
            await expect(driver.sendCommand(0xd0, Buffer.alloc(11))).rejects.toThrow(TelinkMeshErrorCode.PAYLOAD_TOO_LARGE);
            expect(link.writes.map((w) => w.endpoint)).toStrictEqual(["pair", "notify"]);
        });
    });

    describe("notifications", () => {
        beforeEach(async () => {
            await driver.connect();
        });

        it("delivers reports to the sink", () => {
            link.notify(TelinkCommand.TIME_REPORT, createPayload([0xea, 0x07, 0x0a, 0x13, 0x0c, 0x22, 0x38]));

            expect(sink.onTimeReport).toHaveBeenCalledTimes(1);
            expect(sink.onTimeReport).toHaveBeenCalledWith({
                type: "time",
                source: 5,
                sequence: 0x000100,
                year: 2026,
                month: 10,
                day: 19,
                hour: 12,
                minute: 34,
                second: 56,
                weekday: 1,
            });
        });

        it("updates the session from address reports", () => {
            link.notify(TelinkCommand.ADDRESS_REPORT, createPayload([0x03, 0x00, 0xff, 0xee, 0xdd, 0xcc, 0xbb, 0xaa]));

            expect(sink.onAddressReport).toHaveBeenCalledTimes(1);
            expect(driver.state.meshAddress).toStrictEqual(3);
        });

        it("logs and drops frames that cannot be processed", () => {
            const errorSpy = vi.spyOn(logger, "error");

            expect(() => link.emitRaw(Buffer.alloc(5))).not.toThrow();
            expect(errorSpy).toHaveBeenCalledTimes(1);
            expect(errorSpy).toHaveBeenCalledWith(
                "Failed to process notification: InvalidFrameLength: Invalid frame length 5",
                "telink-mesh-driver",
            );
        });
    });

    describe("disconnect", () => {
        it("zero-fills the session key and releases the link", async () => {
            await driver.connect();
            await driver.disconnect();

            expect(driver.connected).toStrictEqual(false);
            expect(driver.state.hasSession).toStrictEqual(false);
            expect(link.disconnectCount).toStrictEqual(1);
            expect(link.subscribed).toStrictEqual(false);
            await expect(driver.queryTime()).rejects.toThrow(TelinkMeshErrorCode.NO_ACTIVE_SESSION);
        });

        it("waits for a pending connect, then tears it down", async () => {
            const pending = driver.connect();

            await driver.disconnect();
            await pending;

            expect(driver.connected).toStrictEqual(false);
            expect(driver.state.hasSession).toStrictEqual(false);
            expect(link.connectCount).toStrictEqual(1);
            expect(link.disconnectCount).toStrictEqual(1);
            expect(link.subscribed).toStrictEqual(false);
        });

        it("leaves the error of a pending connect to its caller", async () => {
            link.failWritesTo = "pair";

            const failing = expect(driver.connect()).rejects.toThrow("Write to pair failed");

            await driver.disconnect();
            await failing;

            expect(driver.connected).toStrictEqual(false);
            expect(link.disconnectCount).toStrictEqual(1);
        });

        it("does not touch the link when not connected", async () => {
            await driver.disconnect();

            expect(link.disconnectCount).toStrictEqual(0);
        });

        it("refuses to write without link even if a session exists", async () => {
            driver.state.establish(NONCE_LOCAL, Buffer.alloc(8));

            await expect(driver.queryTime()).rejects.toThrow(`Not connected to ${DEVICE_ADDRESS}`);
        });
    });
});
