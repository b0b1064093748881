/**
 * @module transport/ports
 * @description Discovery of sensors among the host's serial ports
 */

import { SerialPort } from 'serialport';
import { DeviceNotFoundError } from '../core/errors';
import { DEFAULT_BAUD_RATE, closePort, openPort } from './serial';

/** USB vendor id of the sensor (5840) */
export const USB_VENDOR_ID = 0x16d0;
/** USB product id of the sensor (3797) */
export const USB_PRODUCT_ID = 0x0ed5;

/**
 * A serial port with a sensor behind it
 */
export interface SensorPortInfo {
    path: string;
    vendorId: number;
    productId: number;
    manufacturer?: string;
    serialNumber?: string;
}

export interface FindPortsOptions {
    /** Also return ports that are already in use */
    allPorts?: boolean;
}

function parseUsbId(id: string | undefined): number | null {
    if (id === undefined) return null;
    const value = parseInt(id, 16);
    return Number.isNaN(value) ? null : value;
}

async function isAvailable(path: string): Promise<boolean> {
    const port = new SerialPort({ path, baudRate: DEFAULT_BAUD_RATE, autoOpen: false });
    try {
        await openPort(port);
        await closePort(port);
    } catch {
        return false;
    }
    return true;
}

/**
 * List the serial ports a sensor is attached to
 *
 * Unless `allPorts` is set, ports that cannot be opened are left out.
 *
 * @throws DeviceNotFoundError when no port matches
 */
export async function findPorts(options: FindPortsOptions = {}): Promise<SensorPortInfo[]> {
    const found: SensorPortInfo[] = [];

    for (const info of await SerialPort.list()) {
        const vendorId = parseUsbId(info.vendorId);
        const productId = parseUsbId(info.productId);
        if (vendorId !== USB_VENDOR_ID || productId !== USB_PRODUCT_ID) continue;
        if (!options.allPorts && !(await isAvailable(info.path))) continue;

        found.push({
            path: info.path,
            vendorId,
            productId,
            manufacturer: info.manufacturer,
            serialNumber: info.serialNumber,
        });
    }

    if (found.length === 0) {
        throw new DeviceNotFoundError(
            options.allPorts ? 'No radar modules detected' : 'No available radar modules detected'
        );
    }

    return found;
}

/**
 * First available sensor port
 */
export async function findPort(): Promise<SensorPortInfo> {
    const [first] = await findPorts();
    return first;
}
