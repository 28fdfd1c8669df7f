export interface NotificationRecord {
  bucketName: string;

  //as sent by s3, percent encoded with + for spaces
  encodedKey: string;
}

export interface InvocationResult {
  statusCode: 200 | 500;
  body: string;
}
