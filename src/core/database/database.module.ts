import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import type { Connection } from 'mongoose';
import { applyPartitionScopePlugin } from '../../common/mongoose/partition-scope.plugin';

@Module({
  imports: [
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        uri: config.getOrThrow<string>('MONGO_URI'),
        connectionFactory: (connection: Connection): Connection => {
          applyPartitionScopePlugin(connection);
          return connection;
        },
      }),
    }),
  ],
})
export class DatabaseModule {}
