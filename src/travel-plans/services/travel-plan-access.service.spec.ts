import { getModelToken } from '@nestjs/mongoose';
import { Test, TestingModule } from '@nestjs/testing';
import { Types } from 'mongoose';
import { mockQuery } from '../../../test/utils/query.mock';
import { TravelPlan } from '../schemas/travel-plan.schema';
import { TravelPlanCollaborator } from '../schemas/travel-plan-collaborator.schema';
import { TravelPlanAccessService } from './travel-plan-access.service';

describe('TravelPlanAccessService', () => {
  let service: TravelPlanAccessService;
  const planModel = { findById: jest.fn() };
  const collaboratorModel = { findOne: jest.fn() };
  const ownerId = new Types.ObjectId().toString();
  const otherId = new Types.ObjectId().toString();
  const planId = new Types.ObjectId();
  const plan = { _id: planId, userId: new Types.ObjectId(ownerId), title: '부산 여행' };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TravelPlanAccessService,
        { provide: getModelToken(TravelPlan.name), useValue: planModel },
        { provide: getModelToken(TravelPlanCollaborator.name), useValue: collaboratorModel },
      ],
    }).compile();
    service = module.get<TravelPlanAccessService>(TravelPlanAccessService);
    planModel.findById.mockReturnValue(mockQuery(plan));
  });

  it('treats the creator as owner without looking up collaborators', async () => {
    const access = await service.requireWrite(planId.toString(), ownerId);

    expect(access.role).toBe('owner');
    expect(collaboratorModel.findOne).not.toHaveBeenCalled();
  });

  it('lets an edit collaborator write', async () => {
    collaboratorModel.findOne.mockReturnValue(mockQuery({ permission: 'edit' }));

    await expect(service.requireWrite(planId.toString(), otherId)).resolves.toMatchObject({ role: 'edit' });
    expect(collaboratorModel.findOne).toHaveBeenCalledWith({ planId, userId: otherId });
  });

  it('lets a view collaborator read but not write', async () => {
    collaboratorModel.findOne.mockReturnValue(mockQuery({ permission: 'view' }));

    await expect(service.requireRead(planId.toString(), otherId)).resolves.toMatchObject({ role: 'view' });
    await expect(service.requireWrite(planId.toString(), otherId)).rejects.toMatchObject({
      status: 403,
      code: 'AUTHORIZATION_ERROR',
    });
  });

  it('rejects users without any relation to the plan', async () => {
    collaboratorModel.findOne.mockReturnValue(mockQuery(null));

    await expect(service.requireRead(planId.toString(), otherId)).rejects.toMatchObject({ status: 403 });
  });

  it('rejects collaborators on owner-only operations', async () => {
    await expect(service.requireOwner(planId.toString(), otherId)).rejects.toMatchObject({ status: 403 });
  });

  it('answers 404 for an unknown plan', async () => {
    planModel.findById.mockReturnValue(mockQuery(null));

    await expect(service.findPlan(planId.toString())).rejects.toMatchObject({ status: 404, code: 'NOT_FOUND' });
  });
});
