import { BadRequestException, ConflictException, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { AuthorizationException, ResourceNotFoundException } from '../../common/exceptions/app.exception';
import { UserService } from '../../user/user.service';
import { AddCollaboratorDto } from '../dto/collaborator.dto';
import {
  TravelPlanCollaborator,
  TravelPlanCollaboratorDocument,
} from '../schemas/travel-plan-collaborator.schema';
import { TravelPlanAccessService } from './travel-plan-access.service';

@Injectable()
export class TravelPlanCollaboratorsService {
  private readonly logger = new Logger(TravelPlanCollaboratorsService.name);

  constructor(
    @InjectModel(TravelPlanCollaborator.name) private collaboratorModel: Model<TravelPlanCollaborator>,
    private readonly access: TravelPlanAccessService,
    private readonly userService: UserService,
  ) {}

  async list(planId: string, userId: string): Promise<TravelPlanCollaboratorDocument[]> {
    await this.access.requireRead(planId, userId);
    return this.collaboratorModel.find({ planId }).sort({ createdAt: 1 }).exec();
  }

  async add(planId: string, userId: string, dto: AddCollaboratorDto): Promise<TravelPlanCollaboratorDocument> {
    const plan = await this.access.requireOwner(planId, userId);
    const invitee = await this.userService.findOneByEmail(dto.email);
    if (!invitee) {
      throw new ResourceNotFoundException('해당 이메일의 사용자를 찾을 수 없습니다.');
    }
    if (invitee._id.toString() === plan.userId.toString()) {
      throw new BadRequestException('여행 계획 소유자는 협업자로 추가할 수 없습니다.');
    }
    const existing = await this.collaboratorModel.findOne({ planId: plan._id, userId: invitee._id }).exec();
    if (existing) {
      throw new ConflictException('이미 협업자로 등록된 사용자입니다.');
    }

    const collaborator = await this.collaboratorModel.create({
      planId: plan._id,
      userId: invitee._id,
      permission: dto.permission ?? 'edit',
      invitedBy: new Types.ObjectId(userId),
    });
    this.logger.log(`User ${invitee._id.toString()} joined plan ${planId} as ${collaborator.permission}`);
    return collaborator;
  }

  /**
   * The owner removes anyone; a collaborator may only remove themselves.
   */
  async remove(planId: string, collaboratorUserId: string, userId: string): Promise<void> {
    const plan = await this.access.findPlan(planId);
    if (plan.userId.toString() !== userId && collaboratorUserId !== userId) {
      throw new AuthorizationException('협업자를 삭제할 권한이 없습니다.');
    }
    const deleted = await this.collaboratorModel.findOneAndDelete({ planId: plan._id, userId: collaboratorUserId }).exec();
    if (!deleted) {
      throw new ResourceNotFoundException('협업자를 찾을 수 없습니다.');
    }
  }

  async touch(collaborator: TravelPlanCollaboratorDocument, now: Date = new Date()): Promise<void> {
    await this.collaboratorModel.updateOne({ _id: collaborator._id }, { $set: { lastViewedAt: now } }).exec();
  }
}
