/**
 * A bot command such as "/tr fr hello" -> { name: 'tr', args: ['fr', 'hello'], rest: 'fr hello' }.
 */
export interface ParsedCommand {
    name: string;
    args: string[];
    /** Everything after the command name, whitespace preserved */
    rest: string;
}

const COMMAND_PATTERN = /^\/([a-z][a-z0-9_-]*)(?:@\w+)?(?:\s+([\s\S]*))?$/i;

/**
 * Parses a slash command, dropping a trailing "@BotName" mention.
 * Returns null for anything that is not a command.
 */
export function parseCommand(text: string): ParsedCommand | null {
    const match = COMMAND_PATTERN.exec(text.trim());
    if (!match) {
        return null;
    }

    const rest = (match[2] ?? '').trim();
    return {
        name: match[1].toLowerCase(),
        args: rest.length > 0 ? rest.split(/\s+/) : [],
        rest,
    };
}

/**
 * Text after the first n arguments of a command, with original spacing.
 */
export function textAfterArgs(command: ParsedCommand, count: number): string {
    let remaining = command.rest;
    for (let i = 0; i < count; i++) {
        remaining = remaining.replace(/^\S+\s*/, '');
    }
    return remaining.trim();
}
