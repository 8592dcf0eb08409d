import { Sici } from "./sici";
import type { SiciFields, SiciOptions } from "./types";

/**
 * Assemble a Sici from plain field values. Each value goes through the
 * segment mutators, so problems are recorded exactly as if set by hand.
 */
export function buildSici(fields: SiciFields, options: SiciOptions = {}): Sici {
	const sici = new Sici(options);
	const { item, contribution, control } = sici;

	if (fields.issn !== undefined) item.issn = fields.issn;
	if (fields.chronology !== undefined) item.chronology = fields.chronology;
	if (fields.enumeration !== undefined) item.enumeration = fields.enumeration;
	if (fields.volume !== undefined) item.volume = fields.volume;
	if (fields.issue !== undefined) item.issue = fields.issue;
	if (fields.supplOrIdx !== undefined) item.supplOrIdx = fields.supplOrIdx;

	if (fields.location !== undefined) contribution.location = fields.location;
	if (fields.titleCode !== undefined) contribution.titleCode = fields.titleCode;
	if (fields.localNumber !== undefined) contribution.localNumber = fields.localNumber;

	if (fields.csi !== undefined) control.csi = fields.csi;
	if (fields.dpi !== undefined) control.dpi = fields.dpi;
	if (fields.mfi !== undefined) control.mfi = fields.mfi;
	if (fields.version !== undefined) control.version = fields.version;

	return sici;
}
