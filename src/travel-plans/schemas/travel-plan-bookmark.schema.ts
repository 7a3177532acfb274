import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type TravelPlanBookmarkDocument = HydratedDocument<TravelPlanBookmark>;

@Schema({ timestamps: true })
export class TravelPlanBookmark {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true })
  userId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlan', required: true })
  planId!: Types.ObjectId;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelPlanBookmarkSchema = SchemaFactory.createForClass(TravelPlanBookmark);

TravelPlanBookmarkSchema.index({ userId: 1, planId: 1 }, { unique: true });
