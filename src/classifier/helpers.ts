/**
 * Classifier helper functions
 */

import type { Catalog, ControlEntry } from '@inventory';

/**
 * Readable labels for the control types the Miniserver reports
 */
const TYPE_LABELS: Readonly<Record<string, string>> = {
  // Lighting and outputs
  Switch: 'Switch',
  Pushbutton: 'Push button',
  Dimmer: 'Dimmer',
  LightController: 'Lighting controller',
  LightControllerV2: 'Lighting controller V2',
  ColorPicker: 'RGB colour picker',
  ColorPickerV2: 'RGB colour picker V2',

  // Shading
  Jalousie: 'Blind / shade',
  Gate: 'Motorised gate',
  Window: 'Motorised window',
  Blind: 'Curtain',

  // Climate
  IRoomController: 'Room climate controller',
  IRoomControllerV2: 'Room climate controller V2',
  Heatmixer: 'Heating mixer',

  // Media
  AudioZone: 'Audio zone',
  MediaClient: 'Media client',
  MediaServer: 'Media server',

  // Alarms and security
  Alarm: 'Alarm',
  AlarmClock: 'Alarm clock',
  Tracker: 'Tracker',
  Presence: 'Presence detector',
  SmokeAlarm: 'Smoke alarm',

  // Metering
  Meter: 'Meter',
  EnergyMonitor: 'Energy monitor',

  // Status
  InfoOnlyDigital: 'Digital status',
  InfoOnlyAnalog: 'Analog status',
  InfoOnlyText: 'Text status',

  // Automation
  TimedSwitch: 'Timed switch',
  UpDownDigital: 'Up/down counter',
  Webpage: 'Web page',
  MessageCenter: 'Message center',

  // Other
  Intercom: 'Intercom',
  CentralVentilation: 'Central ventilation',
  Sauna: 'Sauna',
  Pool: 'Pool'
};

/**
 * Readable label for a type tag; unknown tags come back unchanged
 */
export function describeType(typeTag: string): string {
  return Object.prototype.hasOwnProperty.call(TYPE_LABELS, typeTag) ? TYPE_LABELS[typeTag] : typeTag;
}

/**
 * Display name of the room a control belongs to
 * @param unassignedLabel - Returned when the control has no room
 */
export function roomNameOf(catalog: Catalog, entry: ControlEntry, unassignedLabel: string): string {
  if (entry.roomId === null) {
    return unassignedLabel;
  }
  return catalog.rooms.get(entry.roomId)?.name ?? unassignedLabel;
}

/**
 * Display name of the category a control belongs to, null when none
 */
export function categoryNameOf(catalog: Catalog, entry: ControlEntry): string | null {
  if (entry.categoryId === null) {
    return null;
  }
  return catalog.categories.get(entry.categoryId)?.name ?? null;
}
