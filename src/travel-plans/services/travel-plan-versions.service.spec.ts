import { getModelToken } from '@nestjs/mongoose';
import { Test, TestingModule } from '@nestjs/testing';
import { Types } from 'mongoose';
import { mockQuery } from '../../../test/utils/query.mock';
import { TravelPlan } from '../schemas/travel-plan.schema';
import { TravelPlanVersion } from '../schemas/travel-plan-version.schema';
import { TravelPlanAccessService } from './travel-plan-access.service';
import { TravelPlanVersionsService } from './travel-plan-versions.service';

describe('TravelPlanVersionsService', () => {
  let service: TravelPlanVersionsService;
  const versionModel = { findOne: jest.fn(), create: jest.fn(), find: jest.fn() };
  const planModel = { findByIdAndUpdate: jest.fn() };
  const access = { requireRead: jest.fn(), requireWrite: jest.fn() };
  const userId = new Types.ObjectId().toString();
  const plan = {
    _id: new Types.ObjectId(),
    userId: new Types.ObjectId(userId),
    title: '현재 제목',
    description: null,
    itinerary: { day1: ['불국사'] },
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TravelPlanVersionsService,
        { provide: getModelToken(TravelPlanVersion.name), useValue: versionModel },
        { provide: getModelToken(TravelPlan.name), useValue: planModel },
        { provide: TravelPlanAccessService, useValue: access },
      ],
    }).compile();
    service = module.get<TravelPlanVersionsService>(TravelPlanVersionsService);
    versionModel.create.mockImplementation(async (doc: Record<string, unknown>) => doc);
  });

  it('numbers the first snapshot 1', async () => {
    access.requireWrite.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    versionModel.findOne.mockReturnValue(mockQuery(null));

    const version = await service.create(plan._id.toString(), userId, '출발 전');

    expect(version).toMatchObject({ versionNumber: 1, title: '현재 제목', changeDescription: '출발 전' });
  });

  it('increments from the latest version', async () => {
    access.requireWrite.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    const latestQuery = mockQuery({ versionNumber: 3 });
    versionModel.findOne.mockReturnValue(latestQuery);

    const version = await service.create(plan._id.toString(), userId);

    expect(latestQuery.sort).toHaveBeenCalledWith({ versionNumber: -1 });
    expect(version.versionNumber).toBe(4);
  });

  it('takes the next number when another writer claimed the same one', async () => {
    access.requireWrite.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    versionModel.findOne
      .mockReturnValueOnce(mockQuery({ versionNumber: 3 }))
      .mockReturnValueOnce(mockQuery({ versionNumber: 4 }));
    versionModel.create
      .mockRejectedValueOnce(Object.assign(new Error('E11000 duplicate key error'), { code: 11000 }))
      .mockImplementationOnce(async (doc: Record<string, unknown>) => doc);

    const version = await service.create(plan._id.toString(), userId);

    expect(versionModel.create).toHaveBeenCalledTimes(2);
    expect(versionModel.create.mock.calls[0][0].versionNumber).toBe(4);
    expect(version.versionNumber).toBe(5);
  });

  it('gives up after repeated collisions', async () => {
    access.requireWrite.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    versionModel.findOne.mockReturnValue(mockQuery({ versionNumber: 3 }));
    versionModel.create.mockRejectedValue(Object.assign(new Error('E11000 duplicate key error'), { code: 11000 }));

    await expect(service.create(plan._id.toString(), userId)).rejects.toMatchObject({ code: 11000 });
    expect(versionModel.create).toHaveBeenCalledTimes(5);
  });

  it('does not retry other write errors', async () => {
    access.requireWrite.mockResolvedValue({ plan, role: 'owner', collaborator: null });
    versionModel.findOne.mockReturnValue(mockQuery(null));
    versionModel.create.mockRejectedValue(new Error('connection lost'));

    await expect(service.create(plan._id.toString(), userId)).rejects.toThrow('connection lost');
    expect(versionModel.create).toHaveBeenCalledTimes(1);
  });

  it('snapshots the current state before restoring an older version', async () => {
    access.requireWrite.mockResolvedValue({ plan, role: 'edit', collaborator: null });
    const stored = { versionNumber: 2, title: '예전 제목', description: '예전 설명', itinerary: { day1: ['첨성대'] } };
    versionModel.findOne
      .mockReturnValueOnce(mockQuery(stored))
      .mockReturnValueOnce(mockQuery({ versionNumber: 5 }));
    planModel.findByIdAndUpdate.mockReturnValue(mockQuery({ ...plan, title: '예전 제목' }));

    const restored = await service.restore(plan._id.toString(), 2, userId);

    expect(versionModel.create).toHaveBeenCalledWith(
      expect.objectContaining({ versionNumber: 6, title: '현재 제목', changeDescription: '버전 2 복원 전 자동 저장' }),
    );
    expect(planModel.findByIdAndUpdate).toHaveBeenCalledWith(
      plan._id,
      { $set: { title: '예전 제목', description: '예전 설명', itinerary: { day1: ['첨성대'] } } },
      { new: true },
    );
    expect(restored.title).toBe('예전 제목');
  });

  it('answers 404 for an unknown version number', async () => {
    access.requireRead.mockResolvedValue({ plan, role: 'view', collaborator: null });
    versionModel.findOne.mockReturnValue(mockQuery(null));

    await expect(service.get(plan._id.toString(), 9, userId)).rejects.toMatchObject({ status: 404 });
  });
});
