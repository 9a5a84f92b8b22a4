/** Options that shape the wording of the warning email. */
export interface WarningEmailOptions {
  teamName: string;
  signature: string;
}

/** Plain-text body of the disk-usage warning. */
export function buildWarningEmail(
  firstName: string,
  consumed: string,
  limitTib: number,
  options: WarningEmailOptions,
): string {
  return (
    `${firstName};\n` +
    `You are using ${consumed} in your home directory. Please help ${options.teamName} ` +
    `by decreasing your disk usage to ${String(limitTib)}TB or less. Thanks for your cooperation.\n` +
    `Regards,\n    ${options.signature}`
  );
}
