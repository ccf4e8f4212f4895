/**
 * Render a thrown value for a log line. Error subclasses keep their name
 * in front of the message.
 */
export function formatError(err: unknown): string {
	if (!(err instanceof Error)) {
		return String(err);
	}
	return err.name === "Error" ? err.message : `${err.name}: ${err.message}`;
}
