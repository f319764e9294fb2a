import { Controller, Delete, HttpCode, HttpStatus, Param } from '@nestjs/common';
import {
  DeleteBulletResult,
  DeleteBulletUseCase,
} from '@application/use-cases/delete-bullet.use-case';
import { CallerId } from './request-params';

@Controller('bullets')
export class BulletsController {
  constructor(private readonly deleteBullet: DeleteBulletUseCase) {}

  @Delete(':id')
  @HttpCode(HttpStatus.OK)
  async remove(
    @CallerId() userId: string,
    @Param('id') bulletId: string
  ): Promise<DeleteBulletResult> {
    return this.deleteBullet.execute({ bulletId, userId });
  }
}
