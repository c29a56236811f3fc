/**
 * A named Pulumi backend. `backend` is an opaque URL-like string
 * (`s3://bucket`, `file://./state`, `https://api.pulumi.com`, ...).
 */
export interface ProfileRecord {
	readonly name: string;
	readonly backend: string;
}

export interface RecordStore {
	/** Re-read the backing file. A missing file yields an empty list. */
	readonly load: () => readonly ProfileRecord[];
	/** Current records, in insertion order. Loads on first use. */
	readonly list: () => readonly ProfileRecord[];
	readonly get: (name: string) => ProfileRecord | undefined;
	readonly add: (name: string, backend: string) => ProfileRecord;
	readonly edit: (name: string, backend: string) => ProfileRecord;
	readonly delete: (name: string) => ProfileRecord;
	readonly getPath: () => string;
}
