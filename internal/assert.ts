/**
 * Throws an `Error` unless `fact` holds. The message is `subject` followed by
 * the remaining arguments, separated by spaces.
 * @internal
 */
export function check(fact: boolean, subject: string, ...args: unknown[]): asserts fact {
  if (!fact) {
    args.unshift(subject); // at beginning of message
    throw new Error(args.map(String).join(' '));
  }
}
