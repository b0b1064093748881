/**
 * @module transport
 * @description Byte transports between the SDK and the sensor
 *
 * ## Modules
 * - `transport`: Transport interface and base class
 * - `serial`: Serial port transport with reconnection
 * - `ports`: Sensor port discovery
 * - `memory`: In-memory transport pair and fake sensor
 */

export type {
    TransportOptions,
    TransportState,
    TransportEventType,
    TransportEvent,
    TransportEventHandler,
    Transport,
} from './transport';

export { BaseTransport, DEFAULT_TRANSPORT_OPTIONS } from './transport';

export { SerialPortTransport, DEFAULT_BAUD_RATE } from './serial';
export type { SerialTransportOptions } from './serial';

export { findPorts, findPort, USB_VENDOR_ID, USB_PRODUCT_ID } from './ports';
export type { SensorPortInfo, FindPortsOptions } from './ports';

export {
    InMemoryTransport,
    FakeRadarDevice,
    DEFAULT_FAKE_DEVICE_SETTINGS,
} from './memory';
export type { FakeDeviceSettings } from './memory';
