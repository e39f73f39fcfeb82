import { ModelType } from './database';
import { FixtureConfigError, ModelNotFoundError } from './errors';

/**
 * Maps qualified type names (e.g. `library.models.Book`) to model types.
 * Filled once while the application initializes.
 */
export class ModelRegistry {
    private readonly models: Map<string, ModelType> = new Map();

    constructor(models: readonly ModelType[] = []) {
        models.forEach(model => this.register(model));
    }

    register<T extends object>(model: ModelType<T>): this {
        if (this.models.has(model.typeName)) {
            throw new FixtureConfigError(`Model '${model.typeName}' is already registered`);
        }
        this.models.set(model.typeName, model);
        return this;
    }

    resolve(typeName: string): ModelType {
        const model = this.models.get(typeName);
        if (!model) {
            throw new ModelNotFoundError(typeName);
        }
        return model;
    }

    has(typeName: string): boolean {
        return this.models.has(typeName);
    }

    typeNames(): string[] {
        return Array.from(this.models.keys());
    }
}
