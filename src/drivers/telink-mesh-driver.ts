import { randomBytes } from "node:crypto";
import { CommandDispatcher, type ReportSink } from "../mesh-stack/command-dispatcher.js";
import { MeshCommands } from "../mesh-stack/mesh-commands.js";
import { buildPacket } from "../mesh-stack/packet-builder.js";
import { type MeshParameters, SessionState } from "../mesh-stack/session-state.js";
import { decodePairingResponse, TelinkConsts } from "../telink/telink.js";
import { logger } from "../utils/logger.js";
import type { RadioLink } from "./radio-link.js";

const NS = "telink-mesh-driver";

/** written to the notify endpoint to enable notifications */
const ENABLE_NOTIFICATIONS = Buffer.from([0x01]);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export type TelinkMeshDriverOptions = {
    /** source of the local pairing nonce, defaults to crypto-secure random */
    makeNonce?: () => Buffer;
};

/**
 * Transport adapter: owns the radio link handle and wires it to the protocol engine.
 *
 * Composes `SessionState` (protocol data), `MeshCommands` (outbound) and `CommandDispatcher` (inbound).
 */
export class TelinkMeshDriver<THandle> {
    readonly state: SessionState;
    readonly commands: MeshCommands;
    readonly dispatcher: CommandDispatcher;

    readonly #link: RadioLink<THandle>;
    readonly #makeNonce: () => Buffer;

    #handle: THandle | undefined;
    #unsubscribe: (() => void) | undefined;
    /** in-flight connect, shared by concurrent callers */
    #connecting: Promise<void> | undefined;

    constructor(link: RadioLink<THandle>, params: MeshParameters, sink: ReportSink = {}, options: TelinkMeshDriverOptions = {}) {
        this.#link = link;
        this.#makeNonce = options.makeNonce ?? (() => randomBytes(TelinkConsts.NONCE_SIZE));
        this.state = new SessionState(params);
        this.commands = new MeshCommands(this.state);
        this.dispatcher = new CommandDispatcher(this.state, sink);
    }

    get connected(): boolean {
        return this.#handle !== undefined && this.state.hasSession;
    }

    /**
     * Connect, pair (derive the session key) and enable notifications.
     * No-op if already connected.
     */
    public async connect(): Promise<void> {
        if (this.connected) {
            return;
        }

        if (!this.#connecting) {
            this.#connecting = this.pair().finally(() => {
                this.#connecting = undefined;
            });
        }

        await this.#connecting;
    }

    /**
     * Drop the session (key zero-filled) and release the link.
     * A connect in progress is waited for first, then torn down with the rest.
     */
    public async disconnect(): Promise<void> {
        if (this.#connecting) {
            try {
                await this.#connecting;
            } catch (error) {
                // already rejected to the connect caller
                logger.debug(() => `Pending connect failed before disconnect: ${errorMessage(error)}`, NS);
            }
        }

        const handle = this.#handle;

        this.#unsubscribe?.();
        this.#unsubscribe = undefined;
        this.#handle = undefined;
        this.state.clear();

        if (handle !== undefined) {
            await this.#link.disconnect(handle);

            logger.info(`Disconnected from ${this.state.address}`, NS);
        }
    }

    /**
     * Build, encrypt and write a raw command.
     * The sequence number is consumed even if the write fails.
     */
    public async sendCommand(command: number, payload?: Buffer, destination?: number): Promise<void> {
        await this.write(buildPacket(this.state, command, payload, destination));
    }

    public async queryTime(): Promise<void> {
        await this.write(this.commands.queryTime());
    }

    public async setTime(date?: Date): Promise<void> {
        await this.write(this.commands.setTime(date));
    }

    public async queryDeviceInfo(): Promise<void> {
        await this.write(this.commands.queryDeviceInfo());
    }

    public async queryDeviceVersion(): Promise<void> {
        await this.write(this.commands.queryDeviceVersion());
    }

    public async queryGroups(): Promise<void> {
        await this.write(this.commands.queryGroups());
    }

    public async queryMeshId(): Promise<void> {
        await this.write(this.commands.queryMeshId());
    }

    public async setMeshId(meshAddress: number): Promise<void> {
        await this.write(this.commands.setMeshId(meshAddress));
    }

    public async addGroup(group: number): Promise<void> {
        await this.write(this.commands.addGroup(group));
    }

    public async deleteGroup(group: number): Promise<void> {
        await this.write(this.commands.deleteGroup(group));
    }

    public async reset(): Promise<void> {
        await this.write(this.commands.reset());
    }

    public async queryOtaState(): Promise<void> {
        await this.write(this.commands.queryOtaState());
    }

    private async pair(): Promise<void> {
        const handle = await this.#link.connect(this.state.address);

        logger.debug(() => `Connected to ${this.state.address}, pairing`, NS);

        try {
            const nonceLocal = this.#makeNonce();

            await this.#link.write(handle, "pair", this.state.makePairingRequest(nonceLocal));

            const nonceRemote = decodePairingResponse(await this.#link.read(handle, "pair"));

            this.state.establish(nonceLocal, nonceRemote);

            this.#handle = handle;
            this.#unsubscribe = this.#link.subscribe(handle, "notify", this.onNotification.bind(this));

            await this.#link.write(handle, "notify", ENABLE_NOTIFICATIONS);
        } catch (error) {
            this.#unsubscribe?.();
            this.#unsubscribe = undefined;
            this.#handle = undefined;
            this.state.clear();

            try {
                await this.#link.disconnect(handle);
            } catch (disconnectError) {
                logger.error(`Failed to disconnect from ${this.state.address}: ${errorMessage(disconnectError)}`, NS);
            }

            throw error;
        }

        logger.info(`Paired with ${this.state.address}`, NS);
    }

    private async write(frame: Buffer): Promise<void> {
        if (this.#handle === undefined) {
            // only reachable with a session established out-of-band (no link)
            throw new Error(`Not connected to ${this.state.address}`);
        }

        logger.debug(() => `>>> FRAME[${frame.toString("hex")}]`, NS);

        await this.#link.write(this.#handle, "command", frame);
    }

    /**
     * Notification callback from the link. Errors can't propagate to the link, they are logged.
     */
    private onNotification(data: Buffer): void {
        logger.debug(() => `<<< FRAME[${data.toString("hex")}]`, NS);

        try {
            this.dispatcher.onInbound(data);
        } catch (error) {
            logger.error(`Failed to process notification: ${errorMessage(error)}`, NS);
        }
    }
}
