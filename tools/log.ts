// Diagnostics go to stderr so stdout stays a clean report.
export function log(message: string, source = "screen-calc") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.error(`${formattedTime} [${source}] ${message}`);
}
