export interface TopicLayout {
	baseTopic: string;
	hostname: string;
	state: string;
	status: string;
	set: string;
}

export interface DeviceTopics {
	/** `<base>/<host>` */
	root: string;
	state: string;
	status: string;
	/** `<base>/<host>/<set>/` including the trailing slash */
	commandPrefix: string;
	/** `<base>/<host>/<set>/+` */
	commandWildcard: string;
}

function trimSlashes(s: string): string {
	return s.replace(/^\/+|\/+$/g, "");
}

export function deviceTopics(layout: TopicLayout): DeviceTopics {
	const root = `${trimSlashes(layout.baseTopic)}/${trimSlashes(layout.hostname)}`;
	const commandPrefix = `${root}/${trimSlashes(layout.set)}/`;
	return {
		root,
		state: `${root}/${trimSlashes(layout.state)}`,
		status: `${root}/${trimSlashes(layout.status)}`,
		commandPrefix,
		commandWildcard: `${commandPrefix}+`
	};
}

export function commandTopic(topics: DeviceTopics, command: string): string {
	return `${topics.commandPrefix}${command}`;
}

/**
 * Extract the command suffix from an inbound topic.
 * Returns null for topics outside the command tree or with nested levels.
 */
export function commandFromTopic(topics: DeviceTopics, topic: string): string | null {
	if (!topic.startsWith(topics.commandPrefix)) return null;
	const suffix = topic.slice(topics.commandPrefix.length);
	if (!suffix || suffix.includes("/")) return null;
	return suffix;
}
