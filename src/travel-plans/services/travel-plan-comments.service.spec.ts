import { getModelToken } from '@nestjs/mongoose';
import { Test, TestingModule } from '@nestjs/testing';
import { Types } from 'mongoose';
import { mockQuery } from '../../../test/utils/query.mock';
import { TravelPlanComment } from '../schemas/travel-plan-comment.schema';
import { TravelPlanAccessService } from './travel-plan-access.service';
import { buildCommentTree, TravelPlanCommentsService } from './travel-plan-comments.service';

describe('TravelPlanCommentsService', () => {
  let service: TravelPlanCommentsService;
  const commentModel = { find: jest.fn(), findOne: jest.fn(), create: jest.fn() };
  const access = { requireRead: jest.fn() };
  const ownerId = new Types.ObjectId().toString();
  const authorId = new Types.ObjectId().toString();
  const planId = new Types.ObjectId();
  const plan = { _id: planId, userId: new Types.ObjectId(ownerId) };

  const comment = (id: Types.ObjectId, content: string, parent: Types.ObjectId | null = null) => ({
    _id: id,
    planId,
    userId: new Types.ObjectId(authorId),
    content,
    parentCommentId: parent,
    isEdited: false,
    isDeleted: false,
  });

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TravelPlanCommentsService,
        { provide: getModelToken(TravelPlanComment.name), useValue: commentModel },
        { provide: TravelPlanAccessService, useValue: access },
      ],
    }).compile();
    service = module.get<TravelPlanCommentsService>(TravelPlanCommentsService);
  });

  it('nests replies and lifts orphans to the top level', () => {
    const rootId = new Types.ObjectId();
    const replyId = new Types.ObjectId();
    const orphanId = new Types.ObjectId();

    const tree = buildCommentTree([
      comment(rootId, '첫째 날 일정 좋네요'),
      comment(replyId, '감사합니다', rootId),
      comment(orphanId, '삭제된 댓글에 대한 답글', new Types.ObjectId()),
    ]);

    expect(tree.map((node) => node.content)).toEqual(['첫째 날 일정 좋네요', '삭제된 댓글에 대한 답글']);
    expect(tree[0].replies.map((node) => node.comment_id)).toEqual([replyId.toString()]);
  });

  it('lists visible comments oldest first', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    const query = mockQuery([]);
    commentModel.find.mockReturnValue(query);

    await service.list(planId.toString(), ownerId);

    expect(commentModel.find).toHaveBeenCalledWith({ planId: planId.toString(), isDeleted: false });
    expect(query.sort).toHaveBeenCalledWith({ createdAt: 1 });
  });

  it('rejects a reply to a comment of another plan', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    commentModel.findOne.mockReturnValue(mockQuery(null));
    const parentCommentId = new Types.ObjectId().toString();

    await expect(
      service.create(planId.toString(), ownerId, { content: '답글', parentCommentId }),
    ).rejects.toMatchObject({ status: 404 });
    expect(commentModel.findOne).toHaveBeenCalledWith({ _id: parentCommentId, planId, isDeleted: false });
    expect(commentModel.create).not.toHaveBeenCalled();
  });

  it('only lets the author edit a comment', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    commentModel.findOne.mockReturnValue(mockQuery({ ...comment(new Types.ObjectId(), '원문'), save: jest.fn() }));

    await expect(service.update(planId.toString(), 'c1', ownerId, '수정')).rejects.toMatchObject({ status: 403 });
  });

  it('marks the edit on the author update', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'edit', collaborator: null });
    const existing = { ...comment(new Types.ObjectId(), '원문'), save: jest.fn() };
    existing.save.mockResolvedValue(existing);
    commentModel.findOne.mockReturnValue(mockQuery(existing));

    const updated = await service.update(planId.toString(), 'c1', authorId, '수정된 내용');

    expect(updated).toMatchObject({ content: '수정된 내용', isEdited: true });
  });

  it('lets the plan owner soft-delete any comment', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    const existing = { ...comment(new Types.ObjectId(), '광고'), save: jest.fn() };
    commentModel.findOne.mockReturnValue(mockQuery(existing));

    await service.remove(planId.toString(), 'c1', ownerId);

    expect(existing.isDeleted).toBe(true);
    expect(existing.save).toHaveBeenCalled();
  });

  it('stops other collaborators from deleting comments they did not write', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'edit', collaborator: null });
    commentModel.findOne.mockReturnValue(mockQuery({ ...comment(new Types.ObjectId(), '광고'), save: jest.fn() }));

    await expect(
      service.remove(planId.toString(), 'c1', new Types.ObjectId().toString()),
    ).rejects.toMatchObject({ status: 403 });
  });
});
