import crypto from 'node:crypto';
import {RECORD_ID_NAMESPACE} from '../constants.js';
import type {CodePayload} from './types.js';

function uuidBytes(uuid: string): Buffer {
	const hex = uuid.replace(/-/g, '');
	if (!/^[0-9a-f]{32}$/i.test(hex)) {
		throw new Error(`Invalid UUID: ${uuid}`);
	}
	return Buffer.from(hex, 'hex');
}

function formatUuid(bytes: Buffer): string {
	const hex = bytes.toString('hex');
	return [
		hex.slice(0, 8),
		hex.slice(8, 12),
		hex.slice(12, 16),
		hex.slice(16, 20),
		hex.slice(20, 32),
	].join('-');
}

/**
 * Name-based UUID (RFC 4122 version 5, SHA-1).
 */
export function uuidV5(name: string, namespace: string = RECORD_ID_NAMESPACE): string {
	const hash = crypto
		.createHash('sha1')
		.update(uuidBytes(namespace))
		.update(name, 'utf8')
		.digest()
		.subarray(0, 16);

	hash[6] = ((hash[6] ?? 0) & 0x0f) | 0x50;
	hash[8] = ((hash[8] ?? 0) & 0x3f) | 0x80;
	return formatUuid(hash);
}

/**
 * Identity key of a code unit: "file::type::symbol::name::start-end".
 */
export function codeRecordKey(
	payload: Pick<CodePayload, 'file' | 'type' | 'symbol' | 'name' | 'start_line' | 'end_line'>,
): string {
	return `${payload.file}::${payload.type}::${payload.symbol}::${payload.name}::${payload.start_line}-${payload.end_line}`;
}

/**
 * Deterministic id of a code record. Re-indexing the same unit yields the
 * same id and overwrites the previous record.
 */
export function codeRecordId(
	payload: Pick<CodePayload, 'file' | 'type' | 'symbol' | 'name' | 'start_line' | 'end_line'>,
): string {
	return uuidV5(codeRecordKey(payload));
}

/**
 * Fresh random id for a memory record.
 */
export function newMemoryId(): string {
	return crypto.randomUUID();
}
