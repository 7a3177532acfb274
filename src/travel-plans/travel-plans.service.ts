import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, Types } from 'mongoose';
import { ResourceNotFoundException, ValidationException } from '../common/exceptions/app.exception';
import { CreateTravelPlanDto, TravelPlanListQueryDto, UpdateTravelPlanDto } from './dto/travel-plan.dto';
import { TravelPlan, TravelPlanDocument } from './schemas/travel-plan.schema';
import { TravelPlanBookmark } from './schemas/travel-plan-bookmark.schema';
import { TravelPlanCollaborator } from './schemas/travel-plan-collaborator.schema';
import { TravelPlanComment } from './schemas/travel-plan-comment.schema';
import { TravelPlanShare } from './schemas/travel-plan-share.schema';
import { TravelPlanVersion } from './schemas/travel-plan-version.schema';
import { TravelRoute } from './schemas/travel-route.schema';
import { TravelPlanAccessService } from './services/travel-plan-access.service';
import { TravelPlanCollaboratorsService } from './services/travel-plan-collaborators.service';
import { TravelPlanVersionsService } from './services/travel-plan-versions.service';

export interface Page<T> {
  items: T[];
  total: number;
}

export interface BookmarkedPlan {
  plan: TravelPlanDocument;
  bookmarkedAt: Date | null;
}

function assertDateRange(startDate: Date, endDate: Date): void {
  if (endDate.getTime() < startDate.getTime()) {
    throw new ValidationException([{ field: 'endDate', message: '종료일은 시작일보다 빠를 수 없습니다.' }]);
  }
}

@Injectable()
export class TravelPlansService {
  private readonly logger = new Logger(TravelPlansService.name);

  constructor(
    @InjectModel(TravelPlan.name) private planModel: Model<TravelPlan>,
    @InjectModel(TravelPlanShare.name) private shareModel: Model<TravelPlanShare>,
    @InjectModel(TravelPlanVersion.name) private versionModel: Model<TravelPlanVersion>,
    @InjectModel(TravelPlanComment.name) private commentModel: Model<TravelPlanComment>,
    @InjectModel(TravelPlanCollaborator.name) private collaboratorModel: Model<TravelPlanCollaborator>,
    @InjectModel(TravelPlanBookmark.name) private bookmarkModel: Model<TravelPlanBookmark>,
    @InjectModel(TravelRoute.name) private routeModel: Model<TravelRoute>,
    private readonly access: TravelPlanAccessService,
    private readonly versions: TravelPlanVersionsService,
    private readonly collaborators: TravelPlanCollaboratorsService,
  ) {}

  async create(userId: string, dto: CreateTravelPlanDto): Promise<TravelPlanDocument> {
    assertDateRange(dto.startDate, dto.endDate);
    const plan = await this.planModel.create({
      ...dto,
      itinerary: dto.itinerary ?? {},
      userId: new Types.ObjectId(userId),
    });
    this.logger.log(`Plan ${plan._id.toString()} created by ${userId}`);
    return plan;
  }

  async list(userId: string, query: TravelPlanListQueryDto): Promise<Page<TravelPlanDocument>> {
    const filter: FilterQuery<TravelPlan> = { userId };
    if (query.status) {
      filter.status = query.status;
    }
    const [items, total] = await Promise.all([
      this.planModel
        .find(filter)
        .sort({ createdAt: -1 })
        .skip((query.page - 1) * query.limit)
        .limit(query.limit)
        .exec(),
      this.planModel.countDocuments(filter).exec(),
    ]);
    return { items, total };
  }

  async get(planId: string, userId: string): Promise<TravelPlanDocument> {
    const { plan, collaborator } = await this.access.requireRead(planId, userId);
    if (collaborator) {
      await this.collaborators.touch(collaborator);
    }
    return plan;
  }

  /**
   * Snapshots the current state as a version, then applies the changes.
   */
  async update(planId: string, userId: string, dto: UpdateTravelPlanDto): Promise<TravelPlanDocument> {
    const { plan } = await this.access.requireWrite(planId, userId);
    const { changeDescription, ...changes } = dto;
    assertDateRange(changes.startDate ?? plan.startDate, changes.endDate ?? plan.endDate);

    await this.versions.snapshot(plan, userId, changeDescription ?? '자동 저장');
    const updated = await this.planModel.findByIdAndUpdate(plan._id, { $set: changes }, { new: true }).exec();
    if (!updated) {
      throw new ResourceNotFoundException('여행 계획을 찾을 수 없습니다.');
    }
    return updated;
  }

  async remove(planId: string, userId: string): Promise<void> {
    const plan = await this.access.requireOwner(planId, userId);
    const byPlan = { planId: plan._id };
    await Promise.all([
      this.routeModel.deleteMany(byPlan).exec(),
      this.shareModel.deleteMany(byPlan).exec(),
      this.versionModel.deleteMany(byPlan).exec(),
      this.commentModel.deleteMany(byPlan).exec(),
      this.collaboratorModel.deleteMany(byPlan).exec(),
      this.bookmarkModel.deleteMany(byPlan).exec(),
    ]);
    await this.planModel.deleteOne({ _id: plan._id }).exec();
    this.logger.log(`Plan ${planId} deleted by ${userId}`);
  }

  async toggleBookmark(planId: string, userId: string): Promise<{ bookmarked: boolean }> {
    const plan = await this.access.findPlan(planId);
    const removed = await this.bookmarkModel.findOneAndDelete({ userId, planId: plan._id }).exec();
    if (removed) {
      return { bookmarked: false };
    }
    await this.bookmarkModel.create({ userId: new Types.ObjectId(userId), planId: plan._id });
    return { bookmarked: true };
  }

  async isBookmarked(planId: string, userId: string): Promise<{ bookmarked: boolean }> {
    const existing = await this.bookmarkModel.exists({ userId, planId }).exec();
    return { bookmarked: existing !== null };
  }

  async listBookmarks(userId: string, page: number, limit: number): Promise<Page<BookmarkedPlan>> {
    const [bookmarks, total] = await Promise.all([
      this.bookmarkModel
        .find({ userId })
        .sort({ createdAt: -1 })
        .skip((page - 1) * limit)
        .limit(limit)
        .exec(),
      this.bookmarkModel.countDocuments({ userId }).exec(),
    ]);

    const plans = await this.planModel.find({ _id: { $in: bookmarks.map((bookmark) => bookmark.planId) } }).exec();
    const plansById = new Map(plans.map((plan) => [plan._id.toString(), plan]));

    const items: BookmarkedPlan[] = [];
    for (const bookmark of bookmarks) {
      const plan = plansById.get(bookmark.planId.toString());
      if (plan) {
        items.push({ plan, bookmarkedAt: bookmark.createdAt ?? null });
      }
    }
    return { items, total };
  }
}
