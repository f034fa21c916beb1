import { MongoClient, type Db } from "mongodb";

export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  // Optional model fields are left undefined; they must not be stored as null.
  const client = new MongoClient(mongoUri, { ignoreUndefined: true });
  await client.connect();
  return client;
};

/** One lazily opened client shared by every repository of the process. */
export class MongoConnection {
  private client?: MongoClient;
  private connecting?: Promise<Db>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName: string
  ) {}

  db(): Promise<Db> {
    if (!this.connecting) {
      this.connecting = createMongoClient(this.mongoUri).then(
        (client) => {
          this.client = client;
          return client.db(this.dbName);
        },
        (err: unknown) => {
          this.connecting = undefined;
          throw err;
        }
      );
    }
    return this.connecting;
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.connecting = undefined;
  }
}
