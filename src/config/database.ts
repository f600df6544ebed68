import mongoose from 'mongoose';

export const connectDB = async (mongoURI: string): Promise<void> => {
  try {
    await mongoose.connect(mongoURI);

    console.log('MongoDB Connected Successfully');
    console.log(`Database: ${mongoose.connection.name}`);
  } catch (error) {
    console.error('MongoDB connection error:', error);
    throw error;
  }
};

export const registerConnectionEvents = (): void => {
  mongoose.connection.on('disconnected', () => {
    console.log('MongoDB disconnected');
  });

  mongoose.connection.on('error', (err) => {
    console.error('MongoDB connection error:', err);
  });
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  console.log('MongoDB connection closed');
};
