import { Module } from '@nestjs/common';
import { AwsModule } from './aws/aws.module';
import { CloudinaryModule } from './cloudinary/cloudinary.module';
import { HttpModule } from './http/http.module';
import { LoggingModule } from './logging/logging.module';
import { StagingModule } from './staging/staging.module';

@Module({
  imports: [AwsModule, CloudinaryModule, HttpModule, LoggingModule, StagingModule],
  exports: [AwsModule, CloudinaryModule, HttpModule, LoggingModule, StagingModule],
})
export class SharedModule {}
