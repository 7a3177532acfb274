import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { AuthorizationException, ResourceNotFoundException } from '../../common/exceptions/app.exception';
import { TravelPlan, TravelPlanDocument } from '../schemas/travel-plan.schema';
import {
  TravelPlanCollaborator,
  TravelPlanCollaboratorDocument,
} from '../schemas/travel-plan-collaborator.schema';

export type PlanRole = 'owner' | 'edit' | 'view';

export interface PlanAccess {
  plan: TravelPlanDocument;
  role: PlanRole;
  collaborator: TravelPlanCollaboratorDocument | null;
}

/**
 * Resolves what a user may do with a plan: the owner and `edit` collaborators
 * write, `view` collaborators only read, everyone else gets 403.
 */
@Injectable()
export class TravelPlanAccessService {
  constructor(
    @InjectModel(TravelPlan.name) private planModel: Model<TravelPlan>,
    @InjectModel(TravelPlanCollaborator.name) private collaboratorModel: Model<TravelPlanCollaborator>,
  ) {}

  async findPlan(planId: string): Promise<TravelPlanDocument> {
    const plan = await this.planModel.findById(planId).exec();
    if (!plan) {
      throw new ResourceNotFoundException('여행 계획을 찾을 수 없습니다.');
    }
    return plan;
  }

  async resolve(planId: string, userId: string): Promise<PlanAccess | null> {
    const plan = await this.findPlan(planId);
    if (plan.userId.toString() === userId) {
      return { plan, role: 'owner', collaborator: null };
    }
    const collaborator = await this.collaboratorModel.findOne({ planId: plan._id, userId }).exec();
    return collaborator ? { plan, role: collaborator.permission, collaborator } : null;
  }

  async requireRead(planId: string, userId: string): Promise<PlanAccess> {
    const access = await this.resolve(planId, userId);
    if (!access) {
      throw new AuthorizationException('이 여행 계획에 접근할 권한이 없습니다.');
    }
    return access;
  }

  async requireWrite(planId: string, userId: string): Promise<PlanAccess> {
    const access = await this.requireRead(planId, userId);
    if (access.role === 'view') {
      throw new AuthorizationException('이 여행 계획을 수정할 권한이 없습니다.');
    }
    return access;
  }

  async requireOwner(planId: string, userId: string): Promise<TravelPlanDocument> {
    const plan = await this.findPlan(planId);
    if (plan.userId.toString() !== userId) {
      throw new AuthorizationException('여행 계획 소유자만 할 수 있는 작업입니다.');
    }
    return plan;
  }
}
