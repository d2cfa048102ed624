import { Module } from '@nestjs/common';
import { InstallHelperLauncher } from './install-helper.launcher';
import { UpdaterController } from './updater.controller';
import { UpdaterService } from './updater.service';

@Module({
  controllers: [UpdaterController],
  providers: [UpdaterService, InstallHelperLauncher],
})
export class UpdaterModule {}
