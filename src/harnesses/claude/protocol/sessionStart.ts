/**
 * SessionStart hook wire types (Claude Code protocol).
 *
 * The hook writes exactly one `SessionStartHookOutput` object to stdout
 * and exits 0; the host appends `additionalContext` to the session.
 */

export const SESSION_START_EVENT = 'SessionStart';

export type SessionStartContext = {
	hookEventName: typeof SESSION_START_EVENT;
	additionalContext: string;
};

export type SessionStartHookOutput = {
	hookSpecificOutput: SessionStartContext;
};

export function createSessionStartOutput(
	additionalContext: string,
): SessionStartHookOutput {
	return {
		hookSpecificOutput: {
			hookEventName: SESSION_START_EVENT,
			additionalContext,
		},
	};
}
