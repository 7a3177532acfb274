import { HttpStatus } from '@nestjs/common';
import { AppException } from '../common/exceptions/app.exception';

export type ShareLinkGoneReason = 'EXPIRED' | 'MAX_USES_REACHED';

export class ShareLinkGoneException extends AppException {
  constructor(reason: ShareLinkGoneReason) {
    super(
      reason,
      reason === 'EXPIRED' ? '만료된 공유 링크입니다.' : '최대 사용 횟수를 초과한 공유 링크입니다.',
      HttpStatus.GONE,
    );
  }
}
