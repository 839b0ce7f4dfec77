// src/index.ts

export { FingerprintClient, DEFAULT_FINGER_WAIT } from './client.js';
export { CommandProtocol } from './command-protocol.js';
export { ImageStreamer } from './image-streamer.js';
export type { ImageStreamerOptions } from './image-streamer.js';
export { DeviceConfigurator, baudRateToMultiplier } from './device-configurator.js';
export { FramedTransport } from './framers/framed-transport.js';
export type { FramedTransportOptions } from './framers/framed-transport.js';
export {
  MAX_PAYLOAD_SIZE,
  buildPacket,
  parsePacketHeader,
  parsePacket,
  parseFrame,
} from './packet-builder.js';
export { packetChecksum } from './utils/checksum.js';
export { expandNibbles } from './utils/pixel-decoder.js';
export { encodePgm } from './utils/pgm.js';
export { encodePng } from './utils/png.js';
export { CaptureServer, CAPTURE_PATH } from './server/capture-server.js';
export type { CaptureResponse } from './server/capture-server.js';
export { NodeSerialTransport } from './transport/node-transports/node-serialport.js';
export { createTransport } from './transport/factory.js';
export type { TransportConfig } from './transport/factory.js';
export { SensorEmulator } from './sensor-emulator/sensor-emulator.js';
export {
  DEFAULT_SETTINGS_FILE,
  parseSettings,
  formatSettings,
  readSettings,
  writeSettings,
  resetSettings,
} from './config/settings-store.js';
export { default as Logger, rootLogger } from './logger.js';
export * from './errors.js';
export * from './constants/constants.js';
export type * from './types/sensor-types.js';
