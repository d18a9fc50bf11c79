import * as readline from "readline";
import { GntpClient } from "./client.js";
import {
  EncryptionAlgorithm,
  Headers,
  MessageType,
  ResponseType,
} from "../../../packages/protocol/src/constants.js";
import type { OutgoingRequest, Response } from "../../../packages/protocol/src/types.js";

/**
 * CLI for sending GNTP requests
 */
export class GntpCLI {
  private client: GntpClient;
  private rl: readline.Interface;
  private password: string | undefined;
  private encryption: EncryptionAlgorithm = EncryptionAlgorithm.NONE;

  constructor(host: string, port: number) {
    this.client = new GntpClient({ host, port });
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: "gntp> ",
    });

    this.wireReadline();
  }

  /**
   * Wire readline
   */
  private wireReadline(): void {
    this.rl.on("line", (input: string) => {
      const trimmed = input.trim();
      if (!trimmed) {
        this.rl.prompt();
        return;
      }

      this.handleCommand(trimmed)
        .catch((err) => {
          console.error(" Command failed:", err instanceof Error ? err.message : err);
        })
        .finally(() => this.rl.prompt());
    });

    this.rl.on("close", () => {
      console.log("\nGoodbye!");
      process.exit(0);
    });
  }

  /**
   * Handle CLI command
   */
  private async handleCommand(input: string): Promise<void> {
    const [command, ...args] = input.split(" ");

    switch (command) {
      case "register":
        if (args.length < 2) {
          console.log("Usage: register <application> <type> [type...]");
        } else {
          const [application, ...types] = args;
          await this.send({
            messageType: MessageType.REGISTER,
            headers: new Map<string, string>([[Headers.APPLICATION_NAME, application]]),
            notificationTypes: types.map(
              (type) =>
                new Map<string, string>([
                  [Headers.NOTIFICATION_NAME, type],
                  [Headers.NOTIFICATION_ENABLED, "True"],
                ])
            ),
          });
        }
        break;

      case "notify":
        if (args.length < 3) {
          console.log("Usage: notify <application> <type> <title> [text...]");
        } else {
          const [application, type, title, ...text] = args;
          const headers = new Map<string, string>([
            [Headers.APPLICATION_NAME, application],
            [Headers.NOTIFICATION_NAME, type],
            [Headers.NOTIFICATION_TITLE, title],
          ]);
          if (text.length > 0) {
            headers.set(Headers.NOTIFICATION_TEXT, text.join(" "));
          }
          await this.send({ messageType: MessageType.NOTIFY, headers });
        }
        break;

      case "password":
        this.password = args.length > 0 ? args.join(" ") : undefined;
        console.log(this.password ? "🔑 Password set" : "🔑 Password cleared");
        break;

      case "encrypt": {
        const algorithm = Object.values(EncryptionAlgorithm).find(
          (value) => value === args[0]?.toUpperCase()
        );
        if (!algorithm) {
          console.log(`Usage: encrypt <${Object.values(EncryptionAlgorithm).join("|")}>`);
        } else {
          this.encryption = algorithm;
          console.log(`🔒 Encryption: ${algorithm}`);
        }
        break;
      }

      case "quit":
      case "exit":
        this.rl.close();
        break;

      case "help":
        this.showHelp();
        break;

      default:
        console.log(`Unknown command: ${command}. Type 'help' for available commands.`);
    }
  }

  private async send(request: OutgoingRequest): Promise<void> {
    const response = await this.client.send({
      ...request,
      password: this.password,
      encryption: this.encryption,
    });
    this.displayResponse(response);
  }

  /**
   * Display a response
   */
  private displayResponse(response: Response): void {
    const action = response.headers.get(Headers.RESPONSE_ACTION) ?? "?";

    if (response.type === ResponseType.OK) {
      console.log(`✅ ${action} accepted`);
      return;
    }

    const code = response.headers.get(Headers.ERROR_CODE);
    const description = response.headers.get(Headers.ERROR_DESCRIPTION);
    console.log(` ${action} failed (${code}): ${description}`);
  }

  /**
   * Show help
   */
  private showHelp(): void {
    console.log(`
Available commands:
  register <app> <type...>          - Register an application and its types
  notify <app> <type> <title> [text] - Send a notification
  password [value]                  - Set (or clear) the password
  encrypt <NONE|AES|DES|3DES>       - Choose encryption (needs a password)
  help                              - Show this help
  quit / exit                       - Exit
`);
  }

  start(): void {
    this.showHelp();
    this.rl.prompt();
  }
}
