import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { AuthModule } from '../auth/auth.module';
import { UserModule } from '../user/user.module';
import { TravelPlan, TravelPlanSchema } from './schemas/travel-plan.schema';
import { TravelPlanBookmark, TravelPlanBookmarkSchema } from './schemas/travel-plan-bookmark.schema';
import { TravelPlanCollaborator, TravelPlanCollaboratorSchema } from './schemas/travel-plan-collaborator.schema';
import { TravelPlanComment, TravelPlanCommentSchema } from './schemas/travel-plan-comment.schema';
import { TravelPlanShare, TravelPlanShareSchema } from './schemas/travel-plan-share.schema';
import { TravelPlanVersion, TravelPlanVersionSchema } from './schemas/travel-plan-version.schema';
import { TravelRoute, TravelRouteSchema } from './schemas/travel-route.schema';
import { TravelPlanAccessService } from './services/travel-plan-access.service';
import { TravelPlanCollaboratorsService } from './services/travel-plan-collaborators.service';
import { TravelPlanCommentsService } from './services/travel-plan-comments.service';
import { TravelPlanSharesService } from './services/travel-plan-shares.service';
import { TravelPlanVersionsService } from './services/travel-plan-versions.service';
import { TravelPlanCollaboratorsController } from './travel-plan-collaborators.controller';
import { TravelPlanCommentsController } from './travel-plan-comments.controller';
import { SharedPlansController, TravelPlanSharesController } from './travel-plan-shares.controller';
import { TravelPlanVersionsController } from './travel-plan-versions.controller';
import { TravelPlansController } from './travel-plans.controller';
import { TravelPlansService } from './travel-plans.service';

const planModels = MongooseModule.forFeature([
  { name: TravelPlan.name, schema: TravelPlanSchema },
  { name: TravelPlanShare.name, schema: TravelPlanShareSchema },
  { name: TravelPlanVersion.name, schema: TravelPlanVersionSchema },
  { name: TravelPlanComment.name, schema: TravelPlanCommentSchema },
  { name: TravelPlanCollaborator.name, schema: TravelPlanCollaboratorSchema },
  { name: TravelPlanBookmark.name, schema: TravelPlanBookmarkSchema },
  { name: TravelRoute.name, schema: TravelRouteSchema },
]);

@Module({
  imports: [AuthModule, UserModule, planModels],
  controllers: [
    TravelPlansController,
    TravelPlanSharesController,
    SharedPlansController,
    TravelPlanVersionsController,
    TravelPlanCommentsController,
    TravelPlanCollaboratorsController,
  ],
  providers: [
    TravelPlansService,
    TravelPlanAccessService,
    TravelPlanSharesService,
    TravelPlanVersionsService,
    TravelPlanCommentsService,
    TravelPlanCollaboratorsService,
  ],
  exports: [TravelPlanAccessService, planModels],
})
export class TravelPlansModule {}
