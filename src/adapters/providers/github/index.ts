export * from './github-provider.adapter';
