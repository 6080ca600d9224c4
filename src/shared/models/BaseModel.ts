export abstract class BaseModel<TId = number> {
  id!: TId

  created_at!: Date
  updated_at!: Date
}
