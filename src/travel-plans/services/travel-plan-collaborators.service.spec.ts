import { getModelToken } from '@nestjs/mongoose';
import { Test, TestingModule } from '@nestjs/testing';
import { Types } from 'mongoose';
import { mockQuery } from '../../../test/utils/query.mock';
import { UserService } from '../../user/user.service';
import { TravelPlanCollaborator } from '../schemas/travel-plan-collaborator.schema';
import { TravelPlanAccessService } from './travel-plan-access.service';
import { TravelPlanCollaboratorsService } from './travel-plan-collaborators.service';

describe('TravelPlanCollaboratorsService', () => {
  let service: TravelPlanCollaboratorsService;
  const collaboratorModel = { find: jest.fn(), findOne: jest.fn(), create: jest.fn(), findOneAndDelete: jest.fn() };
  const access = { requireOwner: jest.fn(), requireRead: jest.fn(), findPlan: jest.fn() };
  const userService = { findOneByEmail: jest.fn() };
  const ownerId = new Types.ObjectId();
  const friendId = new Types.ObjectId();
  const plan = { _id: new Types.ObjectId(), userId: ownerId };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TravelPlanCollaboratorsService,
        { provide: getModelToken(TravelPlanCollaborator.name), useValue: collaboratorModel },
        { provide: TravelPlanAccessService, useValue: access },
        { provide: UserService, useValue: userService },
      ],
    }).compile();
    service = module.get<TravelPlanCollaboratorsService>(TravelPlanCollaboratorsService);
    access.requireOwner.mockResolvedValue(plan);
    access.findPlan.mockResolvedValue(plan);
  });

  describe('add', () => {
    it('answers 404 for an unknown email', async () => {
      userService.findOneByEmail.mockResolvedValue(null);

      await expect(
        service.add(plan._id.toString(), ownerId.toString(), { email: 'nobody@example.com' }),
      ).rejects.toMatchObject({ status: 404 });
    });

    it('refuses to add the owner', async () => {
      userService.findOneByEmail.mockResolvedValue({ _id: ownerId });

      await expect(
        service.add(plan._id.toString(), ownerId.toString(), { email: 'owner@example.com' }),
      ).rejects.toMatchObject({ status: 400 });
    });

    it('answers 409 for an existing collaborator', async () => {
      userService.findOneByEmail.mockResolvedValue({ _id: friendId });
      collaboratorModel.findOne.mockReturnValue(mockQuery({ _id: new Types.ObjectId() }));

      await expect(
        service.add(plan._id.toString(), ownerId.toString(), { email: 'friend@example.com' }),
      ).rejects.toMatchObject({ status: 409 });
    });

    it('adds the user with edit permission by default', async () => {
      userService.findOneByEmail.mockResolvedValue({ _id: friendId });
      collaboratorModel.findOne.mockReturnValue(mockQuery(null));
      collaboratorModel.create.mockImplementation(async (doc: Record<string, unknown>) => ({
        _id: new Types.ObjectId(),
        ...doc,
      }));

      const collaborator = await service.add(plan._id.toString(), ownerId.toString(), { email: 'friend@example.com' });

      expect(collaborator).toMatchObject({ planId: plan._id, userId: friendId, permission: 'edit' });
    });
  });

  describe('remove', () => {
    it('lets a collaborator leave', async () => {
      collaboratorModel.findOneAndDelete.mockReturnValue(mockQuery({ _id: new Types.ObjectId() }));

      await service.remove(plan._id.toString(), friendId.toString(), friendId.toString());

      expect(collaboratorModel.findOneAndDelete).toHaveBeenCalledWith({ planId: plan._id, userId: friendId.toString() });
    });

    it('stops a collaborator from removing someone else', async () => {
      await expect(
        service.remove(plan._id.toString(), new Types.ObjectId().toString(), friendId.toString()),
      ).rejects.toMatchObject({ status: 403 });
      expect(collaboratorModel.findOneAndDelete).not.toHaveBeenCalled();
    });

    it('answers 404 when the user is not a collaborator', async () => {
      collaboratorModel.findOneAndDelete.mockReturnValue(mockQuery(null));

      await expect(
        service.remove(plan._id.toString(), friendId.toString(), ownerId.toString()),
      ).rejects.toMatchObject({ status: 404 });
    });
  });
});
