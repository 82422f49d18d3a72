import fs from "fs/promises";
import { connect, type ConnectionOptions, type NatsConnection } from "nats";
import { FatalConfigError, errorMessage } from "../errors.js";

/**
 * What the extractor needs from the message bus
 */
export interface BusClient {
  publish(subject: string, payload: Uint8Array): Promise<void>;
}

export interface NatsConnectionConfig {
  address: string;
  username?: string;
  password?: string;
  passwordFile?: string;
  /** Client name reported to the server */
  name?: string;
}

/**
 * Build NATS connect options, adding user/password authentication when a
 * username is configured. The password comes from the config or, failing
 * that, from the password file.
 */
export const prepareNatsConnection = async (
  config: NatsConnectionConfig,
): Promise<ConnectionOptions> => {
  const base: ConnectionOptions = {
    servers: config.address,
    ...(config.name ? { name: config.name } : {}),
  };

  if (!config.username) {
    console.log(
      `[nats] Connecting to NATS server at ${config.address} without authentication`,
    );
    return base;
  }

  let password = config.password;
  if (password === undefined && config.passwordFile) {
    try {
      password = (await fs.readFile(config.passwordFile, "utf-8")).trim();
    } catch (error) {
      throw new FatalConfigError(
        `Could not read NATS password file ${config.passwordFile}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    console.log(
      `[nats] Using NATS user=${config.username} with password from file ${config.passwordFile}`,
    );
  }

  if (password === undefined) {
    throw new FatalConfigError(
      `No NATS password supplied for user=${config.username} (set NATS_PASSWORD or NATS_PASSWORD_FILE)`,
    );
  }

  console.log(
    `[nats] Connecting to NATS server ${config.address} with user=${config.username} and password=***`,
  );
  return { ...base, user: config.username, pass: password };
};

export class NatsBusClient implements BusClient {
  private constructor(private readonly connection: NatsConnection) {}

  static async connect(config: NatsConnectionConfig): Promise<NatsBusClient> {
    const options = await prepareNatsConnection(config);
    try {
      const connection = await connect(options);
      console.log(`[nats] Connected to ${connection.getServer()}`);
      return new NatsBusClient(connection);
    } catch (error) {
      throw new FatalConfigError(
        `Could not connect to NATS server ${config.address}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Fire-and-forget publish. Throws synchronously inside the client when the
   * connection is closed or draining, which surfaces here as a rejection.
   */
  async publish(subject: string, payload: Uint8Array): Promise<void> {
    this.connection.publish(subject, payload);
  }

  /**
   * Flush pending messages and close the connection
   */
  async close(): Promise<void> {
    if (this.connection.isClosed()) {
      return;
    }
    await this.connection.drain();
    console.log("[nats] Connection drained and closed");
  }
}
