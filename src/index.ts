export { type RadioLink, type RadioLinkEndpoint, TELINK_MESH_ENDPOINT_UUIDS, TELINK_MESH_SERVICE_UUID } from "./drivers/radio-link.js";
export { TelinkMeshDriver, type TelinkMeshDriverOptions } from "./drivers/telink-mesh-driver.js";
export { CommandDispatcher, type ReportSink } from "./mesh-stack/command-dispatcher.js";
export { MeshCommands } from "./mesh-stack/mesh-commands.js";
export { buildPacket } from "./mesh-stack/packet-builder.js";
export { type MeshParameters, SessionState, validateMeshParameters } from "./mesh-stack/session-state.js";
export {
    combineNameAndPassword,
    decodePairingResponse,
    deriveSessionKey,
    encryptPairingProof,
    formatMACAddress,
    isDeviceAddress,
    isGroupAddress,
    makePairingRequest,
    parseMACAddress,
    reverseMACAddress,
    TelinkCommand,
    TelinkMeshError,
    TelinkMeshErrorCode,
    telinkEncrypt,
} from "./telink/telink.js";
export {
    decodeCommandFrame,
    decodeNotificationFrame,
    decryptCommandFrame,
    decryptNotificationFrame,
    encodeCommandFrame,
    encodeNotificationFrame,
    encryptCommandFrame,
    encryptNotificationFrame,
    type TelinkCommandFrame,
    type TelinkNotificationFrame,
    verifyCommandFrame,
} from "./telink/telink-frame.js";
export type {
    AddressReport,
    DeviceInfoReport,
    GroupIdReport,
    OnlineStatusEntry,
    OnlineStatusReport,
    OtaStatusReport,
    TelinkReport,
    TimeReport,
    UnrecognizedReport,
} from "./telink/telink-reports.js";
export { readMeshConfig } from "./utils/config.js";
export { type Logger, noopLogger, setLogger } from "./utils/logger.js";
