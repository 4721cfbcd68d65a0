import http from 'http';
import https from 'https';
import type { RecordUnit } from '@initrack/common';
import { getDefaultLoggers } from './log';
import type { Logger } from './log';

// Accepts a store base URL (http://host:port) or the full /api/records path.
export function normalizeEndpoint(endpoint: string): string {
	if (/\/api\/records$/.test(endpoint)) return endpoint;
	return endpoint.replace(/\/$/, '') + '/api/records';
}

// POSTs one unit to a store endpoint; resolves once the store accepted it.
export function postRecord(endpoint: string, unit: RecordUnit): Promise<void> {
	return new Promise((resolve, reject) => {
		const url = new URL(normalizeEndpoint(endpoint));
		const body = Buffer.from(JSON.stringify(unit));
		const isHttps = url.protocol === 'https:';
		const client = isHttps ? https : http;
		const req = client.request(
			{
				protocol: url.protocol,
				hostname: url.hostname,
				port: url.port || (isHttps ? 443 : 80),
				path: url.pathname + url.search,
				method: 'POST',
				headers: {
					'Content-Type': 'application/json',
					'Content-Length': body.length,
				},
			},
			(res) => {
				// consume to free socket
				res.on('data', () => {});
				res.on('end', () => {
					if (res.statusCode && res.statusCode >= 400) reject(new Error(`store responded ${res.statusCode}`));
					else resolve();
				});
			}
		);
		req.on('error', reject);
		req.write(body);
		req.end();
	});
}

// Fire-and-forget sink for TrackInitOptions.sink; failures are logged, never thrown.
export function endpointSink(endpoint: string, logger?: Logger) {
	return (unit: RecordUnit) => {
		postRecord(endpoint, unit).catch((err: unknown) => {
			(logger ?? getDefaultLoggers().warn)('[initrack][sink-error]', endpoint, err instanceof Error ? err.message : err);
		});
	};
}
