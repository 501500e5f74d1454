import 'reflect-metadata';

import { getModelForClass, modelOptions, prop, type ReturnModelType } from '@typegoose/typegoose';

@modelOptions({
  schemaOptions: {
    collection: 'categories',
    timestamps: true
  }
})
export class Category {
  public id!: string;

  @prop({ required: true, type: () => String, trim: true, uppercase: true, maxlength: 20, unique: true })
  public code!: string;

  @prop({ required: true, type: () => String, trim: true, maxlength: 120 })
  public name!: string;

  @prop({ type: () => String, trim: true, maxlength: 500 })
  public description?: string;

  @prop({ type: () => Boolean, default: true })
  public active!: boolean;

  @prop({ type: () => Date })
  public validFrom?: Date;

  public createdAt!: Date;

  public updatedAt!: Date;
}

export const CategoryModel: ReturnModelType<typeof Category> = getModelForClass(Category);

CategoryModel.schema.index({ name: 1 });
CategoryModel.schema.index({ active: 1, createdAt: -1 });
