const DEFAULT_MESSAGE = "Hello! How are you today?";
const DEFAULT_STRESS_ITERATIONS = 3;

export type CliCommand =
  | { kind: "help" }
  | { kind: "auto"; message: string }
  | { kind: "list" }
  | { kind: "status" }
  | { kind: "keys"; provider?: string }
  | { kind: "stress"; iterations: number }
  | { kind: "provider"; provider: string; message?: string };

export function parseCommand(argv: ReadonlyArray<string>): CliCommand {
  const [command, ...rest] = argv;
  const text = rest.join(" ").trim();

  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      return { kind: "help" };
    case "auto":
      return { kind: "auto", message: text || DEFAULT_MESSAGE };
    case "list":
      return { kind: "list" };
    case "status":
      return { kind: "status" };
    case "keys":
      return { kind: "keys", provider: rest[0] };
    case "stress": {
      const parsed = Number.parseInt(rest[0] ?? "", 10);
      return { kind: "stress", iterations: Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_STRESS_ITERATIONS };
    }
    default:
      return { kind: "provider", provider: command, message: text || undefined };
  }
}
