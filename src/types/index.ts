export interface LicenseConfig {
	holder?: string;
	year?: number;
}

/** Shape of vmscaffold.json. Every key is optional. */
export interface ConfigFile {
	box?: string;
	memory?: number;
	cpus?: number;
	network?: string;
	license?: LicenseConfig;
	templatesDir?: string;
}

export interface ConfigOverrides {
	configPath?: string;
	box?: string;
	memory?: number;
	cpus?: number;
}

export interface ScaffoldConfig {
	box: string;
	memory: number;
	cpus: number;
	/** First three octets of the private network, e.g. "192.168.56". */
	network: string;
	license: Required<LicenseConfig>;
	templatesDir: string;
}

export interface ProjectContext {
	projectName: string;
	projectPath: string;
	/** Non-common machines, in the order they are scaffolded. */
	machines: string[];
	config: ScaffoldConfig;
}

export interface ScaffoldOptions {
	projectName: string;
	machines: string[];
	cwd: string;
	config: ScaffoldConfig;
	git?: boolean;
	/** Suppress progress output (used with --json). */
	quiet?: boolean;
}

export interface ScaffoldResult {
	project: {
		name: string;
		path: string;
	};
	machines: string[];
	files: string[];
}
