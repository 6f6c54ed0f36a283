/**
 * Note Editor: replace the user-authored note of one device.
 *
 * The only write path for `note`; ingestion never touches it.
 */

import type { Logger } from "pino";
import { noteUpdateSchema, MalformedReportError } from "@relaywatch/shared";
import type { NoteAck } from "@relaywatch/shared";
import type { DeviceStore } from "./device-store.js";
import { describeIssues } from "./report-validator.js";

export interface NoteEditorDeps {
  store: DeviceStore;
  logger: Logger;
}

/**
 * Validate `{device_id, note}` and store the note.
 *
 * @throws {MalformedReportError} if device_id is missing or the note is not text
 * @throws {DeviceNotFoundError} if the device has never reported
 */
export async function updateDeviceNote(
  deps: NoteEditorDeps,
  payload: unknown,
): Promise<NoteAck> {
  const parsed = noteUpdateSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedReportError(
      `Malformed note update: ${describeIssues(parsed.error)}`,
      { issues: parsed.error.issues },
    );
  }

  const { device_id, note } = parsed.data;
  const device = await deps.store.setNote(device_id, note);
  deps.logger.info({ device_id, note_length: note.length }, "Device note updated");

  return { status: "ok", device_id: device.device_id, note: device.note };
}
