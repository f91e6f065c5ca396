import type { AmqpChannel, ConnectionProvider } from '../types/Amqp';
import { ChannelError, WarrenError, errorMessageOf } from '../types/Errors';

/**
 * Open a channel on the provider's connection
 *
 * Connection failures keep their own error type; a failure to create the channel
 * itself surfaces as a ChannelError.
 */
export async function openChannel(provider: ConnectionProvider): Promise<AmqpChannel> {
  const connection = await provider.getConnection();
  try {
    return await connection.createChannel();
  } catch (error) {
    if (error instanceof WarrenError) throw error;
    throw new ChannelError('Failed to open channel', { error: errorMessageOf(error) });
  }
}
