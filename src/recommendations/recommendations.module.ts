import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { AuthModule } from '../auth/auth.module';
import { KmaModule } from '../kma/kma.module';
import { UserModule } from '../user/user.module';
import { RecommendationsController } from './recommendations.controller';
import { RecommendationsService } from './recommendations.service';
import { Destination, DestinationSchema } from './schemas/destination.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Destination.name, schema: DestinationSchema }]),
    AuthModule,
    KmaModule,
    UserModule,
  ],
  controllers: [RecommendationsController],
  providers: [RecommendationsService],
  exports: [RecommendationsService, MongooseModule],
})
export class RecommendationsModule {}
