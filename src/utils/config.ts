import { readFileSync } from "node:fs";
import { type MeshParameters, validateMeshParameters } from "../mesh-stack/session-state.js";

/**
 * Example `conf.json`:
 * ```json
 * {
 *     "address": "A4:C1:38:00:11:22",
 *     "name": "telink_mesh1",
 *     "password": "123",
 *     "vendor": 529
 * }
 * ```
 */
type Conf = {
    address?: unknown;
    name?: unknown;
    password?: unknown;
    vendor?: unknown;
    meshAddress?: unknown;
};

function isConf(value: unknown): value is Conf {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

const INT_ARG_REGEX = /^(?:0x[0-9a-f]+|\d+)$/i;

function parseIntArg(value: string, label: string): number {
    if (!INT_ARG_REGEX.test(value)) {
        throw new Error(`Invalid ${label} "${value}"`);
    }

    return value.toLowerCase().startsWith("0x") ? Number.parseInt(value.slice(2), 16) : Number.parseInt(value, 10);
}

function requireString(value: unknown, label: string): string {
    if (typeof value !== "string") {
        throw new Error(`Invalid config: "${label}" must be a string`);
    }

    return value;
}

function optionalNumber(value: unknown, label: string): number | undefined {
    if (value === undefined) {
        return undefined;
    }

    if (typeof value !== "number") {
        throw new Error(`Invalid config: "${label}" must be a number`);
    }

    return value;
}

/**
 * Load mesh parameters from a JSON file.
 * Following ENV vars override the file: MESH_ADDRESS, MESH_NAME, MESH_PASSWORD, MESH_VENDOR (decimal or 0x-prefixed hex).
 *
 * @throws if the file is not valid JSON, or the resulting parameters are invalid
 */
export function readMeshConfig(path: string, env: NodeJS.ProcessEnv = process.env): MeshParameters {
    const conf: unknown = JSON.parse(readFileSync(path, "utf8"));

    if (!isConf(conf)) {
        throw new Error(`Invalid config: ${path} must contain an object`);
    }

    const params: MeshParameters = {
        address: env.MESH_ADDRESS ?? requireString(conf.address, "address"),
        name: env.MESH_NAME ?? requireString(conf.name, "name"),
        password: env.MESH_PASSWORD ?? requireString(conf.password, "password"),
        vendor: env.MESH_VENDOR ? parseIntArg(env.MESH_VENDOR, "MESH_VENDOR") : optionalNumber(conf.vendor, "vendor"),
        meshAddress: optionalNumber(conf.meshAddress, "meshAddress"),
    };

    validateMeshParameters(params);

    return params;
}
