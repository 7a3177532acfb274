import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { ResourceNotFoundException } from '../../common/exceptions/app.exception';
import { isDuplicateKeyError } from '../../common/utils/mongo-error.util';
import { TravelPlan, TravelPlanDocument } from '../schemas/travel-plan.schema';
import { TravelPlanVersion, TravelPlanVersionDocument } from '../schemas/travel-plan-version.schema';
import { TravelPlanAccessService } from './travel-plan-access.service';

const MAX_SNAPSHOT_ATTEMPTS = 5;

@Injectable()
export class TravelPlanVersionsService {
  private readonly logger = new Logger(TravelPlanVersionsService.name);

  constructor(
    @InjectModel(TravelPlanVersion.name) private versionModel: Model<TravelPlanVersion>,
    @InjectModel(TravelPlan.name) private planModel: Model<TravelPlan>,
    private readonly access: TravelPlanAccessService,
  ) {}

  /**
   * Stores the plan's current title, description and itinerary under the next version number.
   * Two writers racing for the same number collide on the (planId, versionNumber) index;
   * the loser re-reads the latest number and tries again.
   */
  async snapshot(
    plan: TravelPlanDocument,
    userId: string,
    changeDescription: string | null,
  ): Promise<TravelPlanVersionDocument> {
    for (let attempt = 1; ; attempt += 1) {
      const latest = await this.versionModel.findOne({ planId: plan._id }).sort({ versionNumber: -1 }).exec();
      const versionNumber = (latest?.versionNumber ?? 0) + 1;
      try {
        return await this.versionModel.create({
          planId: plan._id,
          versionNumber,
          title: plan.title,
          description: plan.description ?? null,
          itinerary: plan.itinerary,
          changeDescription,
          createdBy: new Types.ObjectId(userId),
        });
      } catch (error) {
        if (!isDuplicateKeyError(error) || attempt >= MAX_SNAPSHOT_ATTEMPTS) {
          throw error;
        }
        this.logger.debug(`Version ${versionNumber} of plan ${plan._id.toString()} already taken, retrying`);
      }
    }
  }

  async list(planId: string, userId: string): Promise<TravelPlanVersionDocument[]> {
    await this.access.requireRead(planId, userId);
    return this.versionModel.find({ planId }).sort({ versionNumber: -1 }).exec();
  }

  async get(planId: string, versionNumber: number, userId: string): Promise<TravelPlanVersionDocument> {
    await this.access.requireRead(planId, userId);
    return this.findVersion(planId, versionNumber);
  }

  async create(planId: string, userId: string, changeDescription?: string): Promise<TravelPlanVersionDocument> {
    const { plan } = await this.access.requireWrite(planId, userId);
    return this.snapshot(plan, userId, changeDescription ?? null);
  }

  async restore(planId: string, versionNumber: number, userId: string): Promise<TravelPlanDocument> {
    const { plan } = await this.access.requireWrite(planId, userId);
    const version = await this.findVersion(planId, versionNumber);
    await this.snapshot(plan, userId, `버전 ${versionNumber} 복원 전 자동 저장`);

    const restored = await this.planModel
      .findByIdAndUpdate(
        plan._id,
        { $set: { title: version.title, description: version.description ?? null, itinerary: version.itinerary } },
        { new: true },
      )
      .exec();
    if (!restored) {
      throw new ResourceNotFoundException('여행 계획을 찾을 수 없습니다.');
    }
    return restored;
  }

  private async findVersion(planId: string, versionNumber: number): Promise<TravelPlanVersionDocument> {
    const version = await this.versionModel.findOne({ planId, versionNumber }).exec();
    if (!version) {
      throw new ResourceNotFoundException(`버전 ${versionNumber}을(를) 찾을 수 없습니다.`);
    }
    return version;
  }
}
