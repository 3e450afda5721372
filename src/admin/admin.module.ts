// src/admin/admin.module.ts
import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { AdminController } from './admin.controller';
import { ImpersonationExpiryService } from './impersonation-expiry.service';

@Module({
  imports: [AuthModule],
  controllers: [AdminController],
  providers: [ImpersonationExpiryService],
})
export class AdminModule {}
