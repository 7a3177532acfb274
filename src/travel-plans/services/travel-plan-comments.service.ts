import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { AuthorizationException, ResourceNotFoundException } from '../../common/exceptions/app.exception';
import { CreateCommentDto } from '../dto/comment.dto';
import { TravelPlanComment, TravelPlanCommentDocument } from '../schemas/travel-plan-comment.schema';
import { CommentResponse, toCommentResponse } from '../travel-plan.mapper';
import { TravelPlanAccessService } from './travel-plan-access.service';

/**
 * Nests replies under their parents. Input must be oldest first; replies whose
 * parent is no longer visible are shown at the top level.
 */
export function buildCommentTree(comments: TravelPlanComment[]): CommentResponse[] {
  const nodes = new Map<string, CommentResponse>();
  for (const comment of comments) {
    nodes.set(comment._id.toString(), toCommentResponse(comment));
  }

  const roots: CommentResponse[] = [];
  for (const node of nodes.values()) {
    const parent = node.parent_comment_id ? nodes.get(node.parent_comment_id) : undefined;
    if (parent) {
      parent.replies.push(node);
    } else {
      roots.push(node);
    }
  }
  return roots;
}

@Injectable()
export class TravelPlanCommentsService {
  constructor(
    @InjectModel(TravelPlanComment.name) private commentModel: Model<TravelPlanComment>,
    private readonly access: TravelPlanAccessService,
  ) {}

  async list(planId: string, userId: string): Promise<CommentResponse[]> {
    await this.access.requireRead(planId, userId);
    const comments = await this.commentModel.find({ planId, isDeleted: false }).sort({ createdAt: 1 }).exec();
    return buildCommentTree(comments);
  }

  async create(planId: string, userId: string, dto: CreateCommentDto): Promise<TravelPlanCommentDocument> {
    const { plan } = await this.access.requireRead(planId, userId);
    if (dto.parentCommentId) {
      const parent = await this.commentModel
        .findOne({ _id: dto.parentCommentId, planId: plan._id, isDeleted: false })
        .exec();
      if (!parent) {
        throw new ResourceNotFoundException('상위 댓글을 찾을 수 없습니다.');
      }
    }

    return this.commentModel.create({
      planId: plan._id,
      userId: new Types.ObjectId(userId),
      content: dto.content,
      parentCommentId: dto.parentCommentId ? new Types.ObjectId(dto.parentCommentId) : null,
      dayNumber: dto.dayNumber ?? null,
      placeIndex: dto.placeIndex ?? null,
    });
  }

  async update(planId: string, commentId: string, userId: string, content: string): Promise<TravelPlanCommentDocument> {
    await this.access.requireRead(planId, userId);
    const comment = await this.findComment(planId, commentId);
    if (comment.userId.toString() !== userId) {
      throw new AuthorizationException('본인이 작성한 댓글만 수정할 수 있습니다.');
    }
    comment.content = content;
    comment.isEdited = true;
    return comment.save();
  }

  async remove(planId: string, commentId: string, userId: string): Promise<void> {
    const { role } = await this.access.requireRead(planId, userId);
    const comment = await this.findComment(planId, commentId);
    if (comment.userId.toString() !== userId && role !== 'owner') {
      throw new AuthorizationException('댓글 작성자 또는 여행 계획 소유자만 삭제할 수 있습니다.');
    }
    comment.isDeleted = true;
    await comment.save();
  }

  private async findComment(planId: string, commentId: string): Promise<TravelPlanCommentDocument> {
    const comment = await this.commentModel.findOne({ _id: commentId, planId, isDeleted: false }).exec();
    if (!comment) {
      throw new ResourceNotFoundException('댓글을 찾을 수 없습니다.');
    }
    return comment;
  }
}
