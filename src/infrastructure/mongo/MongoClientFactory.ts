import { MongoClient, type MongoClientOptions } from "mongodb";

export const mongoAppName = "crm-record-extractor";

/** One connected client, shared by the record repository and the checkpoint store. */
export const createMongoClient = async (
  mongoUri: string,
  options: MongoClientOptions = { appName: mongoAppName }
): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, options);
  await client.connect();
  return client;
};
