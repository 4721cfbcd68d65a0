import {
  effectiveConfig,
  endpointSink,
  findClassByName,
  findModelType,
  getInitConfig,
  setPatchedMethod,
  trackInit,
} from '@initrack/tracker';
import * as models from './models';

// A third-party patch written against an older forward() without output flags.
function legacyForward(this: models.PretrainedModel, inputIds: number[], { returnDict = false } = {}) {
  const logits = inputIds.map((id) => id * 2);
  return returnDict ? { logits } : logits;
}

function main() {
  try {
    const storeUrl = process.env.STORE_URL;
    const modelName = process.argv[2] || 'RobertaModel';
    const found = findClassByName(modelName, models);
    if (!found) {
      console.error(`[testbed] unknown model ${modelName}`);
      process.exit(1);
    }
    // re-track locally so records can be shipped to the store
    const Model = storeUrl
      ? trackInit(models.BertModel, { project: 'testbed', sink: endpointSink(storeUrl) })
      : models.BertModel;

    const bert = new Model(30522, { hiddenSize: 256, numLayers: 4 });
    console.log('[testbed] model type', findModelType(found));
    console.log('[testbed] record', JSON.stringify(getInitConfig(bert)));
    console.log('[testbed] effective', JSON.stringify(effectiveConfig(bert)));

    setPatchedMethod(models.BertModel, 'forward', legacyForward, { origin: 'legacy-compression' });
    console.log('[testbed] patched forward', JSON.stringify(bert.forward([1, 2, 3], { outputAttentions: true, returnDict: true })));
  } catch (e) {
    console.error('Error running testbed:', e);
    process.exit(1);
  }
}

main();
