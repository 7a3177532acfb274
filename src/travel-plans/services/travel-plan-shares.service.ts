import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import { randomBytes } from 'crypto';
import { Model, Types } from 'mongoose';
import { ResourceNotFoundException } from '../../common/exceptions/app.exception';
import { CreateShareDto } from '../dto/share.dto';
import { TravelPlanDocument } from '../schemas/travel-plan.schema';
import { SharePermission, TravelPlanShare, TravelPlanShareDocument } from '../schemas/travel-plan-share.schema';
import { ShareLinkGoneException, ShareLinkGoneReason } from '../travel-plan.exceptions';
import { toShareResponse } from '../travel-plan.mapper';
import { TravelPlanAccessService } from './travel-plan-access.service';

const DAY_MS = 24 * 60 * 60 * 1000;

export function generateShareToken(): string {
  return randomBytes(32).toString('base64url');
}

export interface SharedPlanView {
  plan: TravelPlanDocument;
  permission: SharePermission;
  canEdit: boolean;
}

@Injectable()
export class TravelPlanSharesService {
  private readonly logger = new Logger(TravelPlanSharesService.name);
  private readonly frontendUrl: string;

  constructor(
    @InjectModel(TravelPlanShare.name) private shareModel: Model<TravelPlanShare>,
    private readonly access: TravelPlanAccessService,
    private readonly configService: ConfigService,
  ) {
    this.frontendUrl = this.configService.get<string>('FRONTEND_URL') || '';
  }

  present(share: TravelPlanShare) {
    return toShareResponse(share, this.frontendUrl);
  }

  /**
   * Issues a new link; the owner's previously active link for the plan stops working.
   */
  async create(planId: string, userId: string, dto: CreateShareDto, now: Date = new Date()): Promise<TravelPlanShareDocument> {
    const plan = await this.access.requireOwner(planId, userId);
    await this.shareModel
      .updateMany({ planId: plan._id, createdBy: userId, isActive: true }, { $set: { isActive: false } })
      .exec();

    const share = await this.shareModel.create({
      planId: plan._id,
      shareToken: generateShareToken(),
      permission: dto.permission ?? 'view',
      expiresAt: dto.expiresInDays ? new Date(now.getTime() + dto.expiresInDays * DAY_MS) : null,
      maxUses: dto.maxUses ?? null,
      createdBy: new Types.ObjectId(userId),
    });
    this.logger.log(`Share link ${share._id.toString()} created for plan ${planId}`);
    return share;
  }

  async list(planId: string, userId: string): Promise<TravelPlanShareDocument[]> {
    await this.access.requireOwner(planId, userId);
    return this.shareModel.find({ planId }).sort({ createdAt: -1 }).exec();
  }

  async setActive(planId: string, shareId: string, userId: string, isActive?: boolean): Promise<TravelPlanShareDocument> {
    await this.access.requireOwner(planId, userId);
    const share = await this.shareModel.findOne({ _id: shareId, planId }).exec();
    if (!share) {
      throw new ResourceNotFoundException('공유 링크를 찾을 수 없습니다.');
    }
    share.isActive = isActive ?? !share.isActive;
    return share.save();
  }

  async remove(planId: string, shareId: string, userId: string): Promise<void> {
    await this.access.requireOwner(planId, userId);
    const deleted = await this.shareModel.findOneAndDelete({ _id: shareId, planId }).exec();
    if (!deleted) {
      throw new ResourceNotFoundException('공유 링크를 찾을 수 없습니다.');
    }
  }

  /**
   * Opens a plan through its share token and counts the use.
   * The count is taken in the same update that checks expiry and the use limit,
   * so concurrent visitors can never exceed `maxUses`.
   */
  async open(token: string, viewerId?: string, now: Date = new Date()): Promise<SharedPlanView> {
    const share = await this.shareModel
      .findOneAndUpdate(
        {
          shareToken: token,
          isActive: true,
          $and: [
            { $or: [{ expiresAt: null }, { expiresAt: { $gte: now } }] },
            { $or: [{ maxUses: null }, { $expr: { $lt: ['$useCount', '$maxUses'] } }] },
          ],
        },
        { $inc: { useCount: 1 } },
        { new: true },
      )
      .exec();
    if (!share) {
      return this.rejectUnusable(token, now);
    }

    const plan = await this.access.findPlan(share.planId.toString());
    const canEdit =
      viewerId !== undefined && (plan.userId.toString() === viewerId || share.permission === 'edit');
    return { plan, permission: share.permission, canEdit };
  }

  // Expired or used-up links are deactivated and answer 410; anything else is unknown.
  private async rejectUnusable(token: string, now: Date): Promise<never> {
    const share = await this.shareModel.findOne({ shareToken: token, isActive: true }).exec();
    if (!share) {
      throw new ResourceNotFoundException('유효하지 않은 공유 링크입니다.');
    }

    let reason: ShareLinkGoneReason;
    if (share.expiresAt && share.expiresAt.getTime() < now.getTime()) {
      reason = 'EXPIRED';
    } else if (share.maxUses && share.useCount >= share.maxUses) {
      reason = 'MAX_USES_REACHED';
    } else {
      throw new ResourceNotFoundException('유효하지 않은 공유 링크입니다.');
    }

    await this.shareModel.updateOne({ _id: share._id, isActive: true }, { $set: { isActive: false } }).exec();
    this.logger.log(`Share link ${share._id.toString()} deactivated: ${reason}`);
    throw new ShareLinkGoneException(reason);
  }
}
