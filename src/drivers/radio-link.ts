/**
 * Logical endpoints exposed by a mesh device.
 * - notify: inbound reports (subscribed)
 * - command: outbound command frames (written)
 * - pair: nonce exchange during pairing (written, then read)
 */
export type RadioLinkEndpoint = "notify" | "command" | "pair";

/** GATT service holding the endpoints */
export const TELINK_MESH_SERVICE_UUID = "00010203-0405-0607-0809-0a0b0c0d1910";

/** GATT characteristic UUID of each endpoint */
export const TELINK_MESH_ENDPOINT_UUIDS: Readonly<Record<RadioLinkEndpoint, string>> = {
    notify: "00010203-0405-0607-0809-0a0b0c0d1911",
    command: "00010203-0405-0607-0809-0a0b0c0d1912",
    pair: "00010203-0405-0607-0809-0a0b0c0d1914",
};

/**
 * Point-to-point radio transport (typically a BLE central) provided by the host application.
 * Errors thrown/rejected by these methods are transport errors and are propagated as is.
 *
 * @template THandle opaque connection handle
 */
export interface RadioLink<THandle> {
    /**
     * @param address MAC address, AA:BB:CC:DD:EE:FF
     */
    connect(address: string): Promise<THandle>;
    disconnect(handle: THandle): Promise<void>;
    write(handle: THandle, endpoint: RadioLinkEndpoint, data: Buffer): Promise<void>;
    read(handle: THandle, endpoint: RadioLinkEndpoint): Promise<Buffer>;
    /**
     * @returns function removing the subscription
     */
    subscribe(handle: THandle, endpoint: RadioLinkEndpoint, callback: (data: Buffer) => void): () => void;
}
