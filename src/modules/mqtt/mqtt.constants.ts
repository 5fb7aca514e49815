export const TEMPERATURE_TOPIC = 'sensor/temperature';
export const HUMIDITY_TOPIC = 'sensor/humidity';
export const COMMAND_TOPICS = [
  `${TEMPERATURE_TOPIC}/command`,
  `${HUMIDITY_TOPIC}/command`,
];

export const MQTT_CONNECT = Symbol('MQTT_CONNECT');
