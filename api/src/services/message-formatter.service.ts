/**
 * Builds the wire message handed to the relay: a To and Subject header,
 * a blank line, then the body. Every line ends in CRLF.
 */
export function formatMessage(recipients: readonly string[], subject: string, body: string): Buffer {
  // A CR or LF inside the subject would start a new header
  const headerSafeSubject = subject.replace(/[\r\n]+/g, ' ');
  const crlfBody = body.replace(/\r?\n/g, '\r\n');

  return Buffer.from(
    `To: ${recipients.join(',')}\r\nSubject: ${headerSafeSubject}\r\n\r\n${crlfBody}\r\n`,
    'utf8'
  );
}
