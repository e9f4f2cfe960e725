import { Amqp, AmqpWs } from 'azure-iot-device-amqp';
import { Mqtt, MqttWs } from 'azure-iot-device-mqtt';

export const TRANSPORT_TYPES = [
  'Amqp',
  'Amqp_Tcp_Only',
  'Amqp_WebSocket_Only',
  'Mqtt',
  'Mqtt_Tcp_Only',
  'Mqtt_WebSocket_Only',
] as const;

export type TransportType = (typeof TRANSPORT_TYPES)[number];

export const DEFAULT_TRANSPORT: TransportType = 'Amqp_Tcp_Only';

export type TransportCtor = typeof Amqp | typeof AmqpWs | typeof Mqtt | typeof MqttWs;

export function parseTransportType(value: string): TransportType | null {
  const needle = value.trim().toLowerCase();
  return TRANSPORT_TYPES.find((entry) => entry.toLowerCase() === needle) ?? null;
}

// The SDK has no TCP-with-websocket-fallback transport, so the plain members pick TCP.
export function resolveTransport(type: TransportType): TransportCtor {
  switch (type) {
    case 'Mqtt':
    case 'Mqtt_Tcp_Only':
      return Mqtt;
    case 'Mqtt_WebSocket_Only':
      return MqttWs;
    case 'Amqp_WebSocket_Only':
      return AmqpWs;
    default:
      return Amqp;
  }
}
