import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type TravelPlanVersionDocument = HydratedDocument<TravelPlanVersion>;

@Schema({ timestamps: true })
export class TravelPlanVersion {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlan', required: true })
  planId!: Types.ObjectId;

  @Prop({ type: Number, required: true })
  versionNumber!: number;

  @Prop({ type: String, required: true })
  title!: string;

  @Prop({ type: String, default: null })
  description?: string | null;

  @Prop({ type: Object, default: {} })
  itinerary!: Record<string, unknown>;

  @Prop({ type: String, default: null })
  changeDescription?: string | null;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true })
  createdBy!: Types.ObjectId;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelPlanVersionSchema = SchemaFactory.createForClass(TravelPlanVersion);

TravelPlanVersionSchema.index({ planId: 1, versionNumber: -1 }, { unique: true });
