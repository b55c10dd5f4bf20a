// ============================================================================
// Call Scripts
// ============================================================================

import { config } from "../config";
import type { Contact } from "../types/campaign";
import { ClinicDirectory, clinicDirectory } from "./clinicDirectory";

export interface ScriptOptions {
  clinicName: string;
  callbackNumber: string;
  cancellationFee: string;
  directory: ClinicDirectory;
}

function defaultOptions(): ScriptOptions {
  return {
    clinicName: config.clinic.name,
    callbackNumber: config.clinic.callbackNumber,
    cancellationFee: config.clinic.cancellationFee,
    directory: clinicDirectory,
  };
}

function orPlaceholder(value: string, placeholder: string): string {
  return value.trim() ? value.trim() : placeholder;
}

/**
 * Office location, expanded to "Name (address)" when the directory knows it
 */
export function describeLocation(location: string, directory: ClinicDirectory): string {
  const name = orPlaceholder(location, "[LOCATION]");
  const address = directory.findAddress(location);
  return address ? `${name} (${address})` : name;
}

function appointmentSentence(contact: Readonly<Contact>, options: ScriptOptions): string {
  const date = orPlaceholder(contact.appointment_date, "[DATE]");
  const time = orPlaceholder(contact.appointment_time, "[TIME]");
  const provider = orPlaceholder(contact.provider_name, "[PROVIDER]");
  const location = describeLocation(contact.office_location, options.directory);
  return `an upcoming appointment on ${date} at ${time} with ${provider} at ${location}.`;
}

function closingLines(options: ScriptOptions): string[] {
  const lines = [
    "Please make sure to arrive 15 minutes prior to your appointment. Also, please make sure to email us your insurance information as soon as possible so that we can get it verified and avoid any delays on the day of your appointment.",
    `If you wish to cancel or reschedule your appointment, please inform us at least 24 hours in advance to avoid a cancellation charge of $${options.cancellationFee}.`,
  ];
  if (options.callbackNumber) {
    lines.push(`For more information, you can call us back on ${options.callbackNumber}.`);
  }
  lines.push("Thank you and have a great day.");
  return lines;
}

/**
 * Interactive reminder: the agent asks the patient to confirm, reschedule
 * or cancel
 */
export function buildReminderScript(
  contact: Readonly<Contact>,
  overrides: Partial<ScriptOptions> = {}
): string {
  const options = { ...defaultOptions(), ...overrides };
  const name = orPlaceholder(contact.patient_name, "the patient");

  return [
    `Hi, good morning! I'm calling from ${options.clinicName}.`,
    `This call is for ${name} to remind you of ${appointmentSentence(contact, options)}`,
    "Please confirm if you'll be able to attend this appointment, or if you need to reschedule or cancel.",
    ...closingLines(options),
  ].join("\n");
}

/**
 * Informational message left by the voicemail fallback call
 */
export function buildVoicemailScript(
  contact: Readonly<Contact>,
  overrides: Partial<ScriptOptions> = {}
): string {
  const options = { ...defaultOptions(), ...overrides };
  const name = orPlaceholder(contact.patient_name, "the patient");

  return [
    `Hi, I am calling from ${options.clinicName}.`,
    `This message is for ${name} to remind them of ${appointmentSentence(contact, options)}`,
    ...closingLines(options),
  ].join("\n");
}

/**
 * Appointment fields echoed to the gateway alongside the correlation id
 */
export function buildRequestData(contact: Readonly<Contact>): Record<string, string> {
  return {
    patient_name: contact.patient_name,
    appointment_date: contact.appointment_date,
    appointment_time: contact.appointment_time,
    provider_name: contact.provider_name,
    office_location: contact.office_location,
    sheet_index: String(contact.sheet_index),
  };
}
