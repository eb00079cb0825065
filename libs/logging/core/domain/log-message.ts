/**
 * A single log message. Opaque text; order between messages is significant.
 * Messages must not contain a line terminator, or line-oriented sinks will
 * read them back as several messages.
 */
export type LogMessage = string;
